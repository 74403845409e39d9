import { describe, it, expect } from 'vitest';
import { DatasetPipeline } from '../../src/application/services/dataset-pipeline.service.js';
import type { PipelineConfig } from '../../src/config/env.js';
import {
  createFaker,
  createGenerationContext,
  generateClaims,
  generateEhrVisits,
  generatePatients,
} from '../../src/application/generators/index.js';
import { readClaimsParquet } from '../../src/application/serializers/index.js';
import {
  BucketSetupError,
  EmptyPatientPoolError,
  InvalidRecordWindowError,
  StorageError,
} from '../../src/domain/errors/index.js';
import { InMemoryStorageGateway } from '../helpers/in-memory-storage.js';

const BUCKET = 'test-bucket';

const window = { start: new Date(2020, 0, 1), end: new Date(2020, 5, 30) };

function configFor(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    bucket: BUCKET,
    bucketSetupMode: 'best-effort',
    recordCounts: { dev: 5, prod: 12 },
    window,
    ...overrides,
  };
}

function csvPatientIds(csv: string): string[] {
  const [, ...rows] = csv.trimEnd().split('\n');
  return rows.map((row) => row.split(',')[0]);
}

describe('Dataset generation end to end', () => {
  it('should tie EHR visits and claims to the generated patients', () => {
    const context = createGenerationContext(createFaker(7), window);

    const patients = generatePatients(5, context);
    const patientIds = patients.map((patient) => patient.patientId);
    const visits = generateEhrVisits(10, patientIds, context);
    const claims = generateClaims(10, patientIds, context);

    expect(patients).toHaveLength(5);
    expect(visits).toHaveLength(10);
    expect(visits.every((visit) => patientIds.includes(visit.patientId))).toBe(true);
    expect(claims.numRows).toBe(10);
    expect(claims.schema).toHaveLength(8);
    expect(Object.keys(claims.columns)).toHaveLength(8);
    expect(claims.columns.patient_id.every((id) => patientIds.includes(id))).toBe(true);
  });

  it('should refuse EHR generation without patients', () => {
    const context = createGenerationContext(createFaker(8), window);

    expect(() => generateEhrVisits(10, [], context)).toThrow(EmptyPatientPoolError);
  });
});

describe('DatasetPipeline', () => {
  it('should run setup, then the dev pass, then the prod pass', async () => {
    const storage = new InMemoryStorageGateway();
    const pipeline = new DatasetPipeline({ storage, faker: createFaker(1) }, configFor());

    await pipeline.run();

    expect(storage.calls).toEqual([
      'listBuckets',
      `ensureBucket:${BUCKET}`,
      'clearPrefix:dev/',
      'upload:dev/patient_data.csv',
      'upload:dev/ehr_data.json',
      'upload:dev/claims_data.parquet',
      'clearPrefix:prod/',
      'upload:prod/patient_data.csv',
      'upload:prod/ehr_data.json',
      'upload:prod/claims_data.parquet',
    ]);
  });

  it('should write three artifacts per tier with their content types', async () => {
    const storage = new InMemoryStorageGateway();
    const pipeline = new DatasetPipeline({ storage, faker: createFaker(2) }, configFor());

    const summaries = await pipeline.run();

    expect(storage.keys(BUCKET)).toEqual([
      'dev/claims_data.parquet',
      'dev/ehr_data.json',
      'dev/patient_data.csv',
      'prod/claims_data.parquet',
      'prod/ehr_data.json',
      'prod/patient_data.csv',
    ]);
    expect(storage.get(BUCKET, 'dev/patient_data.csv')?.contentType).toBe('text/csv');
    expect(storage.get(BUCKET, 'dev/ehr_data.json')?.contentType).toBe('application/json');
    expect(storage.get(BUCKET, 'dev/claims_data.parquet')?.contentType).toBe('application/octet-stream');

    expect(summaries.map(({ tier, patients, ehrVisits, claims }) => ({ tier, patients, ehrVisits, claims }))).toEqual([
      { tier: 'dev', patients: 5, ehrVisits: 5, claims: 5 },
      { tier: 'prod', patients: 12, ehrVisits: 12, claims: 12 },
    ]);
    expect(summaries[0].artifacts.map((artifact) => artifact.key)).toEqual([
      'dev/patient_data.csv',
      'dev/ehr_data.json',
      'dev/claims_data.parquet',
    ]);
  });

  it('should reference only patients of the same tier', async () => {
    const storage = new InMemoryStorageGateway();
    const pipeline = new DatasetPipeline({ storage, faker: createFaker(3) }, configFor());

    await pipeline.run();

    const devIds = csvPatientIds(storage.text(BUCKET, 'dev/patient_data.csv'));
    const prodIds = csvPatientIds(storage.text(BUCKET, 'prod/patient_data.csv'));
    expect(devIds).toHaveLength(5);
    expect(prodIds).toHaveLength(12);
    expect(devIds.filter((id) => prodIds.includes(id))).toEqual([]);

    const ehrLines = storage.text(BUCKET, 'dev/ehr_data.json').split('\n');
    expect(ehrLines).toHaveLength(5);
    for (const line of ehrLines) {
      expect(devIds).toContain(JSON.parse(line).patient_id);
    }

    const stored = storage.get(BUCKET, 'prod/claims_data.parquet');
    expect(stored).toBeDefined();
    const claims = await readClaimsParquet(stored?.body ?? new Uint8Array());
    expect(claims.numRows).toBe(12);
    expect(claims.columns.patient_id.every((id) => prodIds.includes(id))).toBe(true);
  });

  it('should replace what an earlier run left in the tier folder', async () => {
    const storage = new InMemoryStorageGateway({ buckets: [BUCKET] });
    await storage.upload(BUCKET, 'dev/stale.csv', Buffer.from('old'), 'text/csv');
    const pipeline = new DatasetPipeline({ storage, faker: createFaker(4) }, configFor());

    const [dev, prod] = await pipeline.run();

    expect(dev.cleared).toBe(1);
    expect(prod.cleared).toBe(0);
    expect(storage.get(BUCKET, 'dev/stale.csv')).toBeUndefined();
  });

  it('should produce the same text artifacts from the same seed', async () => {
    const first = new InMemoryStorageGateway();
    const second = new InMemoryStorageGateway();

    await new DatasetPipeline({ storage: first, faker: createFaker(5) }, configFor()).run();
    await new DatasetPipeline({ storage: second, faker: createFaker(5) }, configFor()).run();

    expect(second.text(BUCKET, 'dev/patient_data.csv')).toBe(first.text(BUCKET, 'dev/patient_data.csv'));
    expect(second.text(BUCKET, 'prod/ehr_data.json')).toBe(first.text(BUCKET, 'prod/ehr_data.json'));
  });

  describe('bucket setup', () => {
    it('should continue past a setup failure in best-effort mode', async () => {
      const storage = new InMemoryStorageGateway({ buckets: [BUCKET], failEnsureBucket: true });
      const pipeline = new DatasetPipeline({ storage, faker: createFaker(6) }, configFor());

      const summaries = await pipeline.run();

      expect(summaries).toHaveLength(2);
      expect(storage.keys(BUCKET)).toHaveLength(6);
    });

    it('should stop on a setup failure in strict mode', async () => {
      const storage = new InMemoryStorageGateway({ buckets: [BUCKET], failEnsureBucket: true });
      const pipeline = new DatasetPipeline(
        { storage, faker: createFaker(6) },
        configFor({ bucketSetupMode: 'strict' })
      );

      await expect(pipeline.run()).rejects.toThrow(BucketSetupError);
      expect(storage.calls).toEqual(['listBuckets', `ensureBucket:${BUCKET}`]);
    });
  });

  it('should abort the run on the first failed upload without cleaning up', async () => {
    const storage = new InMemoryStorageGateway({ failUploadKey: 'dev/ehr_data.json' });
    const pipeline = new DatasetPipeline({ storage, faker: createFaker(9) }, configFor());

    await expect(pipeline.run()).rejects.toThrow(StorageError);

    expect(storage.calls).not.toContain('clearPrefix:prod/');
    expect(storage.keys(BUCKET)).toEqual(['dev/patient_data.csv']);
  });

  describe('record window', () => {
    const futureWindow = { start: new Date(2099, 0, 1), end: new Date(2024, 4, 17) };

    async function storageWithEarlierRun(): Promise<InMemoryStorageGateway> {
      const storage = new InMemoryStorageGateway({ buckets: [BUCKET] });
      await storage.upload(BUCKET, 'dev/patient_data.csv', Buffer.from('patient_id\n'), 'text/csv');
      return storage;
    }

    it('should reject a window ending before it starts and keep earlier output', async () => {
      const storage = await storageWithEarlierRun();
      const pipeline = new DatasetPipeline(
        { storage, faker: createFaker(11) },
        configFor({ window: futureWindow })
      );

      await expect(pipeline.run()).rejects.toThrow(InvalidRecordWindowError);

      expect(storage.calls).toEqual(['upload:dev/patient_data.csv']);
      expect(storage.keys(BUCKET)).toEqual(['dev/patient_data.csv']);
    });

    it('should reject the window before a single pass clears its folder', async () => {
      const storage = await storageWithEarlierRun();
      const pipeline = new DatasetPipeline(
        { storage, faker: createFaker(12) },
        configFor({ window: futureWindow })
      );

      await expect(pipeline.runPass('dev')).rejects.toThrow(InvalidRecordWindowError);

      expect(storage.calls).not.toContain('clearPrefix:dev/');
      expect(storage.text(BUCKET, 'dev/patient_data.csv')).toBe('patient_id\n');
    });
  });

  it('should run a single tier on its own', async () => {
    const storage = new InMemoryStorageGateway({ buckets: [BUCKET] });
    const pipeline = new DatasetPipeline({ storage, faker: createFaker(10) }, configFor());

    const summary = await pipeline.runPass('prod');

    expect(summary).toMatchObject({ tier: 'prod', folder: 'prod/', patients: 12, cleared: 0 });
    expect(storage.keys(BUCKET)).toEqual([
      'prod/claims_data.parquet',
      'prod/ehr_data.json',
      'prod/patient_data.csv',
    ]);
  });
});
