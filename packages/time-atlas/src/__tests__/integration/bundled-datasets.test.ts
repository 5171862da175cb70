/**
 * Bundled dataset integration
 *
 * Builds the service from the shipped data directory exactly as the CLI does
 * and checks representative historical readings.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import type { TimeResolutionService } from '../../resolution/time-resolution-service.js';
import { createTimeResolutionService } from '../../core/datasets.js';
import { loadConfig } from '../../core/config.js';
import { quietLogger } from '../fixtures/resolution-fixtures.js';

describe('bundled datasets', () => {
  let service: TimeResolutionService;

  beforeAll(async () => {
    service = await createTimeResolutionService(loadConfig({ LOG_LEVEL: 'error' }), quietLogger);
  });

  function resolve(localDatetime: string, lat: number, lon: number, profile = 'strict_history') {
    return service.resolveBody({
      local_datetime: localDatetime,
      latitude: lat,
      longitude: lon,
      parity_profile: profile,
    });
  }

  it('should load every bundled dataset', () => {
    const report = service.health();

    expect(report.patchesLoaded).toBe(7);
    expect(report.boundaryFeatures).toBe(12);
    expect(report.settlements).toBe(49);
    expect(report.boundaryVersion).toBe('bundled-2024a');
    expect(report.patchVersion).toMatch(/^2024\.1\+[0-9a-f]{12}$/);
  });

  it('should apply New York war time in 1943', () => {
    const response = resolve('1943-06-15T14:30:00', 40.7128, -74.006);

    expect(response.utc).toBe('1943-06-15T18:30:00Z');
    expect(response.offset_seconds).toBe(-14400);
    expect(response.confidence).toBe('medium');
    expect(response.provenance.patches_applied).toEqual(['nyc_war_time_1943']);
  });

  it('should apply the Indiana local option through the settlement fallback', () => {
    const response = resolve('1943-07-01T12:00', 39.7684, -86.1581);

    expect(response.zone_id).toBe('America/Indiana/Indianapolis');
    expect(response.utc).toBe('1943-07-01T18:00:00Z');
    expect(response.offset_seconds).toBe(-21600);
    expect(response.confidence).toBe('low');
    expect(response.provenance.patches_applied).toEqual(['indiana_1943_local_option']);
    expect(response.provenance.sources).toEqual(['boundary_index', 'fallback_index', 'patch_registry']);
  });

  it('should follow the Chicago daylight schedule', () => {
    const response = resolve('1950-07-01T12:00', 41.8781, -87.6298);

    expect(response.utc).toBe('1950-07-01T17:00:00Z');
    expect(response.dst_active).toBe(true);
    expect(response.provenance.patches_applied).toEqual(['chicago_dst_1946_1966']);
  });

  it('should switch Louisville to its own zone', () => {
    const response = resolve('1965-07-01T12:00', 38.2527, -85.7585);

    expect(response.zone_id).toBe('America/Kentucky/Louisville');
    expect(response.provenance.patches_applied).toEqual(['kentucky_louisville_split']);
  });

  it('should apply the proposed permanent standard time only under future_compat', () => {
    const future = resolve('2035-07-01T12:00', 52.52, 13.405, 'future_compat');
    const strict = resolve('2035-07-01T12:00', 52.52, 13.405, 'astro_compat');

    expect(future.utc).toBe('2035-07-01T11:00:00Z');
    expect(future.provenance.patches_applied).toEqual(['future_eu_dst_abolition']);
    expect(strict.utc).toBe('2035-07-01T10:00:00Z');
  });

  it('should shift a London spring-forward reading', () => {
    const response = resolve('2023-03-26T01:30', 51.5074, -0.1278);

    expect(response.zone_id).toBe('Europe/London');
    expect(response.utc).toBe('2023-03-26T01:30:00Z');
    expect(response.offset_seconds).toBe(3600);
    expect(response.warnings.map((warning) => warning.code)).toEqual(['non_existent_local_time']);
  });

  it('should fall back to a nautical zone in the open Pacific', () => {
    const response = resolve('2020-01-01T00:00', 0, -140);

    expect(response.zone_id).toBe('Etc/GMT+9');
    expect(response.utc).toBe('2020-01-01T09:00:00Z');
  });
});
