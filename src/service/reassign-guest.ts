import { z } from 'zod';
import { createLogger } from '../logger.js';
import { ServiceValidationError } from '../utils/error.js';
import { generateSlug } from '../config/slugify.js';
import type { ScaleCoordinator } from '../coordinator.js';

const log = createLogger('Service');

export const ReassignGuestSchema = z.object({
  /** Person name or slug. */
  person: z.string().trim().min(1, 'person is required'),
  entry_id: z.string().min(1).optional(),
});

export type ReassignGuestRequest = z.infer<typeof ReassignGuestSchema>;

export interface ReassignGuestResult {
  /** Entry ids whose guest reading was moved to the person. */
  reassigned: string[];
}

/**
 * Move the latest guest reading to a person. Scoped to one entry when
 * `entry_id` is given, otherwise applied to every entry that knows the person.
 *
 * Throws ServiceValidationError when no entries exist or the scope is unknown.
 */
export function reassignGuest(
  coordinators: ReadonlyMap<string, ScaleCoordinator>,
  request: ReassignGuestRequest,
): ReassignGuestResult {
  if (coordinators.size === 0) {
    throw new ServiceValidationError('no_entries', 'No scale entries are configured');
  }

  let targets: ScaleCoordinator[];
  if (request.entry_id !== undefined) {
    const scoped = coordinators.get(request.entry_id);
    if (!scoped) {
      throw new ServiceValidationError(
        'entry_not_found',
        `Scale entry '${request.entry_id}' does not exist`,
      );
    }
    targets = [scoped];
  } else {
    targets = [...coordinators.values()];
  }

  const slug = generateSlug(request.person);
  const candidates =
    request.entry_id !== undefined ? targets : targets.filter((c) => c.hasPerson(slug));
  if (candidates.length === 0) {
    log.warn(`No scale entry has a person '${request.person}'`);
  }

  const reassigned = candidates.filter((c) => c.reassignGuest(slug)).map((c) => c.entry.id);
  return { reassigned };
}

/** Validate an untyped request (e.g. a command payload) before running it. */
export function parseReassignGuestRequest(input: unknown): ReassignGuestRequest {
  const result = ReassignGuestSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    const message = issue?.message ?? 'invalid request';
    throw new ServiceValidationError('invalid_payload', `${where}${message}`);
  }
  return result.data;
}
