/**
 * Wire request validation
 */

import { z } from 'zod';
import { PARITY_PROFILE_NAMES } from '@civil-time/types';
import type { ResolveRequest } from '../core/types.js';
import { InputInvalidError, formatIssues } from '../core/errors.js';
import { parseLocalDateTime } from './local-datetime.js';

const MAX_OFFSET_SECONDS = 18 * 3600;

export const resolveRequestBodySchema = z.object({
  local_datetime: z.string().min(1),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  parity_profile: z.enum(PARITY_PROFILE_NAMES),
  user_provided_offset: z.number().int().min(-MAX_OFFSET_SECONDS).max(MAX_OFFSET_SECONDS).optional(),
  user_provided_zone: z.string().trim().min(1).optional(),
});

/**
 * Validate a wire body into a ResolveRequest.
 *
 * @throws InputInvalidError naming the first offending field
 */
export function parseResolveRequest(body: unknown): ResolveRequest {
  const parsed = resolveRequestBodySchema.safeParse(body);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const field = first && first.path.length > 0 ? String(first.path[0]) : undefined;
    throw new InputInvalidError(
      first ? `invalid request: ${formatIssues([first])[0]}` : 'invalid request',
      field,
      formatIssues(parsed.error.issues)
    );
  }

  const data = parsed.data;
  return {
    localDateTime: parseLocalDateTime(data.local_datetime),
    coordinate: { lat: data.latitude, lon: data.longitude },
    profile: data.parity_profile,
    ...(data.user_provided_offset !== undefined ? { userProvidedOffset: data.user_provided_offset } : {}),
    ...(data.user_provided_zone !== undefined ? { userProvidedZone: data.user_provided_zone } : {}),
  };
}
