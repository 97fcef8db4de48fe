import { z } from 'zod';
import type { HistoryData } from '../interfaces/history-store.js';

const timestamp = z.string().refine((v) => !Number.isNaN(Date.parse(v)), {
  message: 'Invalid timestamp',
});

export const HistoryEntrySchema = z.object({
  timestamp,
  weight: z.number(),
});

export const HistoryDataSchema: z.ZodType<HistoryData, z.ZodTypeDef, unknown> = z.record(
  z.array(HistoryEntrySchema),
);

/** Last published value per state unique id, used to restore after a restart. */
export const RestoreDataSchema = z.record(z.union([z.number(), z.string()]));

export type RestoreData = z.infer<typeof RestoreDataSchema>;
