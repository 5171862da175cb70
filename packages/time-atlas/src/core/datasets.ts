/**
 * Dataset loading and service composition
 *
 * The only place that touches the filesystem. Every dataset is read and
 * validated before the service object exists; any failure is a
 * DataUnavailableError and no partially loaded service is ever returned.
 */

import { readFile } from 'node:fs/promises';
import type { TimeAtlasConfig } from './config.js';
import { DataUnavailableError, type DatasetKind } from './errors.js';
import { createLogger, type Logger } from './utils/logger.js';
import { ZoneBoundaryIndex } from '../boundary/zone-boundary-index.js';
import { SettlementIndex } from '../boundary/settlement-index.js';
import { ZoneLocator, type ZoneLocation } from '../boundary/zone-locator.js';
import { PatchRegistry } from '../patches/patch-registry.js';
import { CoordinateCache } from '../serving/coordinate-cache.js';
import { ParityProfileSelector } from '../resolution/parity-profiles.js';
import { TimeResolutionService } from '../resolution/time-resolution-service.js';

/**
 * Read and parse a JSON (or GeoJSON) dataset file
 *
 * @throws DataUnavailableError when the file is missing, unreadable or not JSON
 */
export async function readJsonDataset(path: string, dataset: DatasetKind): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DataUnavailableError(`Cannot read ${dataset} file`, dataset, path, [], { cause: error });
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new DataUnavailableError(`${dataset} file is not valid JSON`, dataset, path, [], {
      cause: error,
    });
  }
}

export async function loadPatchRegistry(path: string): Promise<PatchRegistry> {
  return PatchRegistry.fromDocument(await readJsonDataset(path, 'patches'), path);
}

export async function loadBoundaryIndex(path: string, version: string): Promise<ZoneBoundaryIndex> {
  return ZoneBoundaryIndex.fromGeoJSON(await readJsonDataset(path, 'boundaries'), version, path);
}

export async function loadSettlementIndex(path: string, version: string): Promise<SettlementIndex> {
  return SettlementIndex.fromCatalog(await readJsonDataset(path, 'settlements'), version, path);
}

/**
 * Load every dataset named by the configuration and wire the service
 */
export async function createTimeResolutionService(
  config: TimeAtlasConfig,
  logger: Logger = createLogger({ module: 'time-atlas' }, config.logLevel)
): Promise<TimeResolutionService> {
  const [patches, boundaries, settlements] = await Promise.all([
    loadPatchRegistry(config.patchFile),
    loadBoundaryIndex(config.boundaryFile, config.boundaryVersion),
    loadSettlementIndex(config.settlementFile, config.settlementVersion),
  ]);

  logger.info('datasets_loaded', {
    patches: patches.size,
    patchVersion: patches.version,
    boundaryFeatures: boundaries.featureCount,
    boundaryVersion: boundaries.version,
    settlements: settlements.size,
    settlementVersion: settlements.version,
  });

  const cache = new CoordinateCache<ZoneLocation>(config.cache);
  const locator = new ZoneLocator({
    boundaries,
    settlements,
    cache,
    fallbackMaxDistanceKm: config.fallbackMaxDistanceKm,
  });

  return new TimeResolutionService({
    locator,
    patches,
    profiles: new ParityProfileSelector(config.foldPolicies),
    boundaries,
    settlements,
    cache,
    logger,
  });
}
