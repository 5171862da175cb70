/**
 * @civil-time/time-atlas
 *
 * Historical local-time to UTC resolution core.
 *
 * @example
 * ```typescript
 * import { createTimeResolutionService, loadConfig } from '@civil-time/time-atlas';
 *
 * const service = await createTimeResolutionService(loadConfig());
 * const response = service.resolveBody({
 *   local_datetime: '1943-06-15T14:30:00',
 *   latitude: 40.7128,
 *   longitude: -74.006,
 *   parity_profile: 'strict_history',
 * });
 * ```
 */

export * from './core/types.js';
export {
  InputInvalidError,
  DataUnavailableError,
  isInputInvalidError,
  isDataUnavailableError,
  type DatasetKind,
} from './core/errors.js';
export { loadConfig, type TimeAtlasConfig } from './core/config.js';
export {
  createTimeResolutionService,
  loadBoundaryIndex,
  loadPatchRegistry,
  loadSettlementIndex,
} from './core/datasets.js';
export { Logger, createLogger, logger, type LogLevel } from './core/utils/logger.js';

export { ZoneBoundaryIndex, type BoundaryMatch } from './boundary/zone-boundary-index.js';
export {
  SettlementIndex,
  type Settlement,
  type NearestSettlement,
} from './boundary/settlement-index.js';
export { ZoneLocator, nauticalZoneId, type ZoneLocation } from './boundary/zone-locator.js';
export { PointInPolygonEngine } from './boundary/pip-engine.js';

export {
  PatchRegistry,
  type HistoricalPatch,
  type PatchMatch,
  type PatchScope,
} from './patches/patch-registry.js';

export { AmbiguityResolver, type AmbiguityResolution } from './resolution/ambiguity-resolver.js';
export {
  ZoneTimeline,
  FixedOffsetTimeline,
  SeasonalRuleTimeline,
  type OffsetTimeline,
} from './resolution/offset-timeline.js';
export {
  ParityProfileSelector,
  parseFoldPolicyOverrides,
  type ProfilePlan,
} from './resolution/parity-profiles.js';
export { ResultAssembler, computeConfidence, toResponseBody } from './resolution/result-assembler.js';
export { parseResolveRequest } from './resolution/request-schema.js';
export { parseLocalDateTime, formatLocalDateTime } from './resolution/local-datetime.js';
export { TimeResolutionService } from './resolution/time-resolution-service.js';

export { CoordinateCache, type CacheStats } from './serving/coordinate-cache.js';
export { type HealthReport, type HealthStatus } from './serving/health.js';
