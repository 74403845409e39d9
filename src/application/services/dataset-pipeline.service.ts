import type { Faker } from '@faker-js/faker';
import type { StorageGateway } from '../../domain/storage/index.js';
import type { PipelineConfig } from '../../config/env.js';
import { EnvironmentTier } from '../../shared/types/index.js';
import { ARTIFACTS, tierFolder } from '../../domain/entities/index.js';
import { BucketSetupError } from '../../domain/errors/index.js';
import {
  assertRecordWindow,
  createGenerationContext,
  encodeEhrVisit,
  generateClaims,
  generateEhrVisits,
  generatePatients,
} from '../generators/index.js';
import type { GenerationContext } from '../generators/index.js';
import { encodeArtifact } from '../serializers/index.js';
import type { ArtifactPayload } from '../serializers/index.js';
import { pipelineLogger as logger } from '../../shared/utils/logger.js';

export interface DatasetPipelineDependencies {
  storage: StorageGateway;
  faker: Faker;
}

export interface UploadedArtifact {
  key: string;
  contentType: string;
  bytes: number;
}

export interface PassSummary {
  tier: EnvironmentTier;
  folder: string;
  cleared: number;
  patients: number;
  ehrVisits: number;
  claims: number;
  artifacts: UploadedArtifact[];
}

// Passes run in this order, one after the other
const PASS_ORDER: readonly EnvironmentTier[] = [EnvironmentTier.DEV, EnvironmentTier.PROD];

export class DatasetPipeline {
  constructor(
    private readonly deps: DatasetPipelineDependencies,
    private readonly config: PipelineConfig
  ) {}

  /**
   * Make sure the destination bucket exists.
   *
   * In best-effort mode a failure is logged and the run carries on, on the
   * assumption that the bucket was provisioned elsewhere.
   */
  async ensureBucket(): Promise<void> {
    const { bucket, bucketSetupMode } = this.config;

    try {
      const result = await this.deps.storage.ensureBucket(bucket);
      logger.info(
        result === 'created'
          ? `Bucket '${bucket}' created successfully`
          : `Bucket '${bucket}' already exists`
      );
    } catch (error) {
      if (bucketSetupMode === 'strict') {
        throw new BucketSetupError(bucket, error);
      }

      logger.error('Error creating bucket, continuing', {
        bucket,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  /**
   * One full pass for a tier: clear its folder, generate all three datasets
   * and upload them. Nothing is rolled back if a step fails, but a window
   * that cannot be sampled is rejected before the folder is touched.
   */
  async runPass(
    tier: EnvironmentTier,
    context: GenerationContext = createGenerationContext(this.deps.faker, this.config.window)
  ): Promise<PassSummary> {
    assertRecordWindow(context.window);

    const { bucket } = this.config;
    const folder = tierFolder(tier);
    const count = this.config.recordCounts[tier];

    logger.info(`Emptying folder '${folder}' in bucket '${bucket}'...`);
    const cleared = await this.deps.storage.clearPrefix(bucket, folder);
    logger.info(`Completed emptying folder '${folder}'`, { deleted: cleared.length });

    const patients = generatePatients(count, context);
    const patientIds = patients.map((patient) => patient.patientId);
    const ehrVisits = generateEhrVisits(count, patientIds, context);
    const claims = generateClaims(count, patientIds, context);

    const artifacts: UploadedArtifact[] = [];
    artifacts.push(
      await this.upload(folder, ARTIFACTS.PATIENTS.filename, { format: ARTIFACTS.PATIENTS.format, patients })
    );
    artifacts.push(
      await this.upload(folder, ARTIFACTS.EHR.filename, {
        format: ARTIFACTS.EHR.format,
        units: ehrVisits.map(encodeEhrVisit),
      })
    );
    artifacts.push(
      await this.upload(folder, ARTIFACTS.CLAIMS.filename, { format: ARTIFACTS.CLAIMS.format, table: claims })
    );

    return {
      tier,
      folder,
      cleared: cleared.length,
      patients: patients.length,
      ehrVisits: ehrVisits.length,
      claims: claims.numRows,
      artifacts,
    };
  }

  /**
   * Bucket setup followed by the dev and prod passes. Ids stay unique
   * across both passes.
   */
  async run(): Promise<PassSummary[]> {
    assertRecordWindow(this.config.window);

    const buckets = await this.deps.storage.listBuckets();
    logger.info(`Connected to ${this.deps.storage.name} storage`, { buckets });

    await this.ensureBucket();

    const context = createGenerationContext(this.deps.faker, this.config.window);
    const summaries: PassSummary[] = [];
    for (const tier of PASS_ORDER) {
      summaries.push(await this.runPass(tier, context));
    }

    logger.info('Data generation and upload completed successfully', {
      passes: summaries.map(({ tier, patients }) => ({ tier, records: patients })),
    });

    return summaries;
  }

  private async upload(
    folder: string,
    filename: string,
    payload: ArtifactPayload
  ): Promise<UploadedArtifact> {
    const key = `${folder}${filename}`;
    logger.info(`Uploading ${filename} in ${payload.format} format...`);

    const { body, contentType } = await encodeArtifact(payload);
    await this.deps.storage.upload(this.config.bucket, key, body, contentType);

    logger.info(`Uploaded ${filename} to ${folder}`, { bytes: body.byteLength });
    return { key, contentType, bytes: body.byteLength };
  }
}
