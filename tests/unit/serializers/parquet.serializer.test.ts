import { describe, it, expect } from 'vitest';
import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { ParquetSchema, ParquetTransformer } from '@dsnp/parquetjs';
import {
  readClaimsParquet,
  serializeClaimsParquet,
} from '../../../src/application/serializers/parquet.serializer.js';
import {
  buildClaimsTable,
  generateClaims,
} from '../../../src/application/generators/claims.generator.js';
import {
  createFaker,
  createGenerationContext,
} from '../../../src/application/generators/generation-context.js';
import { CLAIMS_SCHEMA } from '../../../src/domain/entities/index.js';
import { SchemaViolationError } from '../../../src/domain/errors/index.js';

const PARQUET_MAGIC = 'PAR1';

async function writeParquet(schema: ParquetSchema, rows: Record<string, unknown>[]): Promise<Buffer> {
  const chunks: Buffer[] = [];
  await pipeline(
    Readable.from(rows),
    new ParquetTransformer(schema),
    new Writable({
      objectMode: true,
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    })
  );
  return Buffer.concat(chunks);
}

describe('Claims Parquet serializer', () => {
  const table = buildClaimsTable([
    {
      claim_id: '3f2504e0-4f89-41d3-9a0c-0305e82c3301',
      patient_id: 'patient-1',
      provider_id: '9b2e4c1a-7d3f-4e8a-b5c6-1d2e3f4a5b6c',
      service_date: new Date('2021-04-05T00:00:00.000Z'),
      diagnosis_code: 'I10',
      procedure_code: '99213',
      claim_amount: 1234.56,
      status: 'Paid',
    },
    {
      claim_id: '6c1d2e3f-8a9b-4c0d-9e1f-2a3b4c5d6e7f',
      patient_id: 'patient-2',
      provider_id: '0a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d',
      service_date: new Date('2022-12-31T00:00:00.000Z'),
      diagnosis_code: 'N18.9',
      procedure_code: '93000',
      claim_amount: 100,
      status: 'Pending',
    },
  ]);

  it('should produce a Parquet file in memory', async () => {
    const bytes = await serializeClaimsParquet(table);

    expect(bytes.subarray(0, 4).toString('ascii')).toBe(PARQUET_MAGIC);
    expect(bytes.subarray(bytes.length - 4).toString('ascii')).toBe(PARQUET_MAGIC);
  });

  it('should read back identical typed values', async () => {
    const bytes = await serializeClaimsParquet(table);

    const decoded = await readClaimsParquet(bytes);

    expect(decoded).toEqual(table);
    expect(decoded.columns.service_date[0]).toBeInstanceOf(Date);
    expect(typeof decoded.columns.claim_amount[0]).toBe('number');
  });

  it('should round-trip a generated table', async () => {
    const context = createGenerationContext(createFaker(41), {
      start: new Date(2020, 0, 1),
      end: new Date(2020, 11, 31),
    });
    const generated = generateClaims(25, ['patient-a', 'patient-b'], context);

    const decoded = await readClaimsParquet(await serializeClaimsParquet(generated));

    expect(decoded.numRows).toBe(25);
    expect(decoded.schema).toEqual(CLAIMS_SCHEMA);
    expect(decoded.columns).toEqual(generated.columns);
  });

  it('should reject a file whose columns differ from the claims schema', async () => {
    const bytes = await writeParquet(
      new ParquetSchema({
        claim_id: { type: 'UTF8' },
        claim_amount: { type: 'UTF8' },
      }),
      [{ claim_id: 'c-1', claim_amount: '12.00' }]
    );

    await expect(readClaimsParquet(bytes)).rejects.toThrow(SchemaViolationError);
  });
});
