import { z } from 'zod';
import { GUEST_SLUG } from '../interfaces/body-metrics.js';
import { generateSlug } from './slugify.js';

// --- Regex patterns ---

const ENTITY_ID_REGEX = /^[a-z0-9_]+\.[a-z0-9_]+$/;
const ENTRY_ID_REGEX = /^[a-z0-9_]+$/;

const entityId = z
  .string()
  .regex(ENTITY_ID_REGEX, 'Must be an entity id like "sensor.scale_weight"');

// --- Sub-schemas ---

export const PersonSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Person name is required')
    .refine((v) => generateSlug(v) !== '', {
      message: 'Name must contain at least one letter or digit',
    }),
  height_cm: z.number().positive('Must be a positive number (e.g., 175)'),
  age: z.number().int().min(1).max(120),
  sex: z.enum(['male', 'female']),
  expected_weight: z.number().positive('Must be a positive number (e.g., 72.5)'),
  expected_impedance: z.number().positive().optional(),
  tolerance: z.number().positive('Must be a positive number').default(8),
});

export const ScaleEntrySchema = z
  .object({
    id: z
      .string()
      .regex(ENTRY_ID_REGEX, 'Id must contain only lowercase letters, numbers and _'),
    name: z.string().min(1).optional(),
    weight_sensor: entityId,
    impedance_sensor: entityId.optional(),
    people: z.array(PersonSchema).default([]),
  })
  .superRefine((entry, ctx) => {
    const seen = new Set<string>();
    entry.people.forEach((person, i) => {
      const slug = generateSlug(person.name);
      if (slug === GUEST_SLUG) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['people', i, 'name'],
          message: `'${person.name}' is reserved for unrecognized readings`,
        });
      } else if (seen.has(slug)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['people', i, 'name'],
          message: `A person named '${person.name}' already exists on this scale`,
        });
      }
      seen.add(slug);
    });
  });

export const MqttSchema = z.object({
  broker_url: z.string().min(1, 'Broker URL is required'),
  username: z.string().optional(),
  password: z.string().optional(),
  client_id: z.string().min(1).default('body-metrics-sync'),
  topic: z.string().min(1).default('body-metrics'),
  state_stream_prefix: z.string().min(1).default('homeassistant'),
  qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(1),
  retain: z.boolean().default(true),
  ha_discovery: z.boolean().default(true),
  ha_device_name: z.string().min(1).default('Body Metrics'),
});

export const WebhookSchema = z.object({
  url: z.string().url('Must be a valid URL'),
  method: z.enum(['POST', 'PUT']).default('POST'),
  headers: z.record(z.string()).default({}),
  timeout: z.number().int().positive().default(10_000),
});

export const StorageSchema = z.object({
  dir: z.string().min(1).default('./data'),
});

export const RuntimeSchema = z.object({
  poll_interval: z.number().min(0.5).max(3600).default(2),
  save_delay: z.number().min(0).max(3600).default(60),
  guest_detection: z.boolean().default(true),
  debug: z.boolean().default(false),
});

export const AppConfigSchema = z
  .object({
    version: z.literal(1),
    mqtt: MqttSchema,
    webhook: WebhookSchema.optional(),
    storage: StorageSchema.default({ dir: './data' }),
    runtime: RuntimeSchema.default({
      poll_interval: 2,
      save_delay: 60,
      guest_detection: true,
      debug: false,
    }),
    scales: z.array(ScaleEntrySchema).min(1, 'At least one scale is required'),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.scales.forEach((scale, i) => {
      if (seen.has(scale.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scales', i, 'id'],
          message: `Duplicate scale id '${scale.id}'`,
        });
      }
      seen.add(scale.id);
    });
  });

// --- Inferred types ---

export type PersonConfig = z.infer<typeof PersonSchema>;
export type ScaleEntryConfig = z.infer<typeof ScaleEntrySchema>;
export type MqttConfig = z.infer<typeof MqttSchema>;
export type WebhookConfig = z.infer<typeof WebhookSchema>;
export type StorageConfig = z.infer<typeof StorageSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// --- Error formatting ---

export function formatConfigError(error: z.ZodError, source: string = 'config.yaml'): string {
  const lines = [`Configuration error in ${source}:`, ''];

  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    lines.push(`  ${path}`);
    lines.push(`    ${issue.message}`);
    lines.push('');
  }

  lines.push("Run 'npm run validate' to check your config.");

  return lines.join('\n');
}
