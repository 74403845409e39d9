import type { ClaimsTable, Patient } from '../../domain/entities/index.js';
import type { ExportFormat } from '../../shared/types/index.js';
import { UnsupportedFormatError } from '../../domain/errors/index.js';
import { serializePatientsCsv } from './csv.serializer.js';
import { serializeJsonLines } from './json-lines.serializer.js';
import { serializeClaimsParquet } from './parquet.serializer.js';

export { serializePatientsCsv } from './csv.serializer.js';
export { serializeJsonLines } from './json-lines.serializer.js';
export { serializeClaimsParquet, readClaimsParquet, claimsParquetSchema } from './parquet.serializer.js';

// Data accepted by each export format
export type ArtifactPayload =
  | { format: 'csv'; patients: readonly Patient[] }
  | { format: 'json'; units: readonly string[] }
  | { format: 'parquet'; table: ClaimsTable };

export interface EncodedArtifact {
  body: Uint8Array;
  contentType: string;
}

export const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv',
  json: 'application/json',
  parquet: 'application/octet-stream',
};

// Tag of a payload that got past the type checker, for the error message
function formatTagOf(payload: unknown): string {
  if (typeof payload === 'object' && payload !== null && 'format' in payload) {
    return String(payload.format);
  }
  return 'unknown';
}

/**
 * Encode a payload in the format named by its tag
 */
export async function encodeArtifact(payload: ArtifactPayload): Promise<EncodedArtifact> {
  switch (payload.format) {
    case 'csv':
      return {
        body: Buffer.from(serializePatientsCsv(payload.patients), 'utf8'),
        contentType: CONTENT_TYPES.csv,
      };

    case 'json':
      return {
        body: Buffer.from(serializeJsonLines(payload.units), 'utf8'),
        contentType: CONTENT_TYPES.json,
      };

    case 'parquet':
      return {
        body: await serializeClaimsParquet(payload.table),
        contentType: CONTENT_TYPES.parquet,
      };

    default:
      throw new UnsupportedFormatError(formatTagOf(payload));
  }
}
