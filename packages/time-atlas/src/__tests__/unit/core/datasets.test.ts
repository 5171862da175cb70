import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createTimeResolutionService,
  loadPatchRegistry,
  readJsonDataset,
} from '../../../core/datasets.js';
import { loadConfig } from '../../../core/config.js';
import { DataUnavailableError } from '../../../core/errors.js';
import { quietLogger } from '../../fixtures/resolution-fixtures.js';

describe('dataset loading', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'time-atlas-'));
    await writeFile(join(dir, 'broken.json'), '{ "version": ');
    await writeFile(join(dir, 'empty-patches.json'), JSON.stringify({ version: 'x', patches: [] }));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report missing files', async () => {
    const path = join(dir, 'missing.json');

    await expect(readJsonDataset(path, 'patches')).rejects.toMatchObject({
      name: 'DataUnavailableError',
      message: 'Cannot read patches file',
      dataset: 'patches',
      path,
    });
  });

  it('should report files that are not JSON', async () => {
    await expect(readJsonDataset(join(dir, 'broken.json'), 'settlements')).rejects.toThrow(
      'settlements file is not valid JSON'
    );
  });

  it('should load an empty patch document', async () => {
    const registry = await loadPatchRegistry(join(dir, 'empty-patches.json'));

    expect(registry.size).toBe(0);
  });

  it('should refuse to build a service when a dataset is missing', async () => {
    const config = loadConfig({ TIME_ATLAS_BOUNDARY_FILE: join(dir, 'missing.geojson') });

    await expect(createTimeResolutionService(config, quietLogger)).rejects.toBeInstanceOf(
      DataUnavailableError
    );
  });
});
