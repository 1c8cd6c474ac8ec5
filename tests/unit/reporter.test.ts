import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  MANIFEST_FILE,
  REPORT_FILE,
  RunReporter,
  calculateFileHash,
} from '../../src/lib/reporter/index.js';
import { ConceptRegistry, loadConceptRegistry } from '../../src/lib/registry/index.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../../src/types/config.js';
import type { DatasetAnalysis } from '../../src/types/data-model.js';
import { FileIOError } from '../../src/utils/errors.js';
import { makeArtifact, makeDefinition } from '../helpers/registry.js';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

const emptyAnalysis: DatasetAnalysis = {
  columnsAnalysis: [],
  summary: {
    totalColumns: 0,
    identifiedColumns: 0,
    unidentifiedColumns: 0,
    identificationRate: 0,
    averageConfidence: 0,
    domainDistribution: {},
    identifierCount: 0,
  },
};

describe('Run Reporter', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'conceptlens-reporter-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should hash file contents with SHA-256', async () => {
    const file = join(dir, 'abc.txt');
    writeFileSync(file, 'abc');
    await expect(calculateFileHash(file)).resolves.toBe(ABC_SHA256);
  });

  it('should wrap unreadable files', async () => {
    await expect(calculateFileHash(join(dir, 'missing.txt'))).rejects.toBeInstanceOf(FileIOError);
  });

  it('should start a manifest for an analysis run', () => {
    const manifest = new RunReporter('9.9.9').getManifest();

    expect(manifest.version).toBe('1');
    expect(manifest.tool).toEqual({ name: 'conceptlens', version: '9.9.9' });
    expect(manifest.run.phase).toBe('analysis');
    expect(manifest.run.id).toMatch(/^[0-9a-f]{16}$/);
    expect(manifest.artifacts).toEqual({});
  });

  it('should record input, registry and config', async () => {
    const input = join(dir, 'input.json');
    writeFileSync(input, 'abc');
    const reporter = new RunReporter('9.9.9');

    await reporter.recordInput(input);
    await reporter.recordRegistry(new ConceptRegistry(makeArtifact([makeDefinition()])));
    reporter.recordConfig(DEFAULT_ANALYSIS_CONFIG);

    const manifest = reporter.getManifest();
    expect(manifest.artifacts.input).toEqual({ path: input, hash: ABC_SHA256, size: 3 });
    expect(manifest.registry).toEqual({ version: 'test-1' });
    expect(manifest.config).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it('should hash registries loaded from a file', async () => {
    const registryPath = join(dir, 'registry.json');
    writeFileSync(registryPath, JSON.stringify(makeArtifact([makeDefinition()])));
    const reporter = new RunReporter('9.9.9');

    await reporter.recordRegistry(loadConceptRegistry(registryPath));

    expect(reporter.getManifest().registry).toEqual({
      version: 'test-1',
      path: registryPath,
      hash: await calculateFileHash(registryPath),
    });
  });

  it('should write the report and manifest', async () => {
    const outputDir = join(dir, 'out');
    const reporter = new RunReporter('9.9.9');

    const result = await reporter.save(outputDir, emptyAnalysis);

    expect(result.reportPath).toBe(join(outputDir, REPORT_FILE));
    expect(result.manifestPath).toBe(join(outputDir, MANIFEST_FILE));
    expect(JSON.parse(readFileSync(result.reportPath, 'utf-8'))).toEqual(emptyAnalysis);

    const written: unknown = JSON.parse(readFileSync(result.manifestPath, 'utf-8'));
    expect(written).toEqual(result.manifest);
    expect(result.manifest.artifacts.report?.hash).toBe(await calculateFileHash(result.reportPath));
  });

  it('should return a copy of the manifest', () => {
    const reporter = new RunReporter('9.9.9');
    reporter.getManifest().artifacts.input = { path: 'x', hash: 'y' };
    expect(reporter.getManifest().artifacts).toEqual({});
  });
});
