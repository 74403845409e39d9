import { z } from 'zod';
import dotenv from 'dotenv';
import { parseISO, isAfter, isValid } from 'date-fns';
import type { BucketSetupMode, RecordCounts, RecordWindow } from '../shared/types/index.js';
import { DEFAULT_RECORD_WINDOW_START } from '../domain/entities/index.js';
import { InvalidRecordWindowError } from '../domain/errors/index.js';

dotenv.config();

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const recordCount = (fallback: string) =>
  z.string().default(fallback).pipe(z.coerce.number().int().min(1));

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),

  // Storage
  STORAGE_DRIVER: z.enum(['s3', 'local']).default('local'),
  BUCKET_NAME: z.string().min(3).default('healthcare-data-bucket'),
  BUCKET_SETUP_MODE: z.enum(['best-effort', 'strict']).default('best-effort'),
  LOCAL_STORAGE_ROOT: z.string().default('./output'),

  // S3
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  S3_ENDPOINT: z.string().url().optional(),
  S3_FORCE_PATH_STYLE: booleanString,

  // Generation
  DEV_RECORDS: recordCount('5000'),
  PROD_RECORDS: recordCount('20000'),
  RECORD_WINDOW_START: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a yyyy-MM-dd date')
    .refine((value) => isValid(parseISO(value)), 'Invalid calendar date')
    .default(DEFAULT_RECORD_WINDOW_START),
  GENERATION_SEED: z.string().pipe(z.coerce.number().int()).optional(),
});

export type Env = z.infer<typeof envSchema>;

const parseEnv = (): Env => {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
};

export const env = parseEnv();

export interface PipelineConfig {
  bucket: string;
  bucketSetupMode: BucketSetupMode;
  recordCounts: RecordCounts;
  window: RecordWindow;
}

// Throws when RECORD_WINDOW_START lies after `now`
export function loadPipelineConfig(source: Env, now: Date = new Date()): PipelineConfig {
  const start = parseISO(source.RECORD_WINDOW_START);
  if (isAfter(start, now)) {
    throw new InvalidRecordWindowError(start, now);
  }

  return {
    bucket: source.BUCKET_NAME,
    bucketSetupMode: source.BUCKET_SETUP_MODE,
    recordCounts: {
      dev: source.DEV_RECORDS,
      prod: source.PROD_RECORDS,
    },
    window: {
      start,
      end: now,
    },
  };
}
