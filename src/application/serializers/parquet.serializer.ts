import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { ParquetReader, ParquetSchema, ParquetTransformer } from '@dsnp/parquetjs';
import { CLAIMS_SCHEMA } from '../../domain/entities/index.js';
import type { ClaimsColumnType, ClaimsTable } from '../../domain/entities/index.js';
import { SchemaViolationError, SerializationError } from '../../domain/errors/index.js';
import { buildClaimsTable, claimsTableRows } from '../generators/claims.generator.js';

type SchemaDefinition = ConstructorParameters<typeof ParquetSchema>[0];
type FieldDefinition = SchemaDefinition[string];
type ParquetField = ParquetSchema['fieldList'][number];

const PARQUET_FIELDS: Record<ClaimsColumnType, FieldDefinition> = {
  string: { type: 'UTF8', compression: 'SNAPPY' },
  'timestamp[ms]': { type: 'TIMESTAMP_MILLIS', compression: 'SNAPPY' },
  float64: { type: 'DOUBLE', compression: 'SNAPPY' },
};

export const claimsParquetSchema = new ParquetSchema(
  Object.fromEntries(CLAIMS_SCHEMA.map((column) => [column.name, PARQUET_FIELDS[column.type]]))
);

// Logical type if the column has one, physical type otherwise
function parquetTypeOf(field: ParquetField): string | undefined {
  return field.originalType ?? field.primitiveType;
}

function assertClaimsColumns(fields: readonly ParquetField[]): void {
  const actual = fields.map((field) => ({ name: field.name, type: parquetTypeOf(field) }));
  const expected = CLAIMS_SCHEMA.map((column) => ({
    name: column.name,
    type: PARQUET_FIELDS[column.type].type,
  }));

  const matches =
    actual.length === expected.length &&
    expected.every(
      (column, index) => actual[index].name === column.name && actual[index].type === column.type
    );

  if (!matches) {
    throw new SchemaViolationError('Parquet columns do not match the claims schema', {
      expected,
      actual,
    });
  }
}

/**
 * Encode a claims table as Parquet, entirely in memory
 */
export async function serializeClaimsParquet(table: ClaimsTable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  const sink = new Writable({
    objectMode: true,
    write(chunk: unknown, _encoding, callback) {
      if (!Buffer.isBuffer(chunk)) {
        callback(new SerializationError('Parquet writer emitted a non-binary chunk'));
        return;
      }
      chunks.push(chunk);
      callback();
    },
  });

  await pipeline(
    Readable.from(claimsTableRows(table)),
    new ParquetTransformer(claimsParquetSchema),
    sink
  );

  return Buffer.concat(chunks);
}

/**
 * Decode a Parquet claims file, checking its columns against the declared
 * schema and every row against the row schema
 */
export async function readClaimsParquet(bytes: Uint8Array): Promise<ClaimsTable> {
  const reader = await ParquetReader.openBuffer(Buffer.from(bytes));

  try {
    assertClaimsColumns(reader.getSchema().fieldList);

    const rows: unknown[] = [];
    const cursor = reader.getCursor();
    for (let row = await cursor.next(); row; row = await cursor.next()) {
      rows.push(row);
    }

    return buildClaimsTable(rows);
  } finally {
    await reader.close();
  }
}
