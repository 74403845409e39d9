import type {
  Claim,
  ClaimRow,
  ClaimsColumns,
  ClaimsTable,
} from '../../domain/entities/index.js';
import {
  CLAIM_AMOUNT_CONSTRAINTS,
  CLAIM_DIAGNOSIS_CODES,
  CLAIM_STATUSES,
  CLAIMS_SCHEMA,
  PROCEDURE_CODES,
} from '../../domain/entities/index.js';
import { SchemaViolationError } from '../../domain/errors/index.js';
import { claimRowSchema } from '../validators/index.js';
import { generationLogger as logger } from '../../shared/utils/logger.js';
import {
  assertPatientPool,
  assertRecordCount,
  sampleCalendarDate,
  toMidnightTimestamp,
} from './generation-context.js';
import type { GenerationContext } from './generation-context.js';

export function toClaimRow(claim: Claim): ClaimRow {
  return {
    claim_id: claim.claimId,
    patient_id: claim.patientId,
    provider_id: claim.providerId,
    service_date: claim.serviceDate,
    diagnosis_code: claim.diagnosisCode,
    procedure_code: claim.procedureCode,
    claim_amount: claim.claimAmount,
    status: claim.status,
  };
}

/**
 * Build a claims table from rows, validating every row against the declared
 * column schema. Rows are never coerced; the first mismatch throws.
 */
export function buildClaimsTable(rows: readonly unknown[]): ClaimsTable {
  const columns: ClaimsColumns = {
    claim_id: [],
    patient_id: [],
    provider_id: [],
    service_date: [],
    diagnosis_code: [],
    procedure_code: [],
    claim_amount: [],
    status: [],
  };

  rows.forEach((candidate, index) => {
    const result = claimRowSchema.safeParse(candidate);
    if (!result.success) {
      throw new SchemaViolationError(`Claim row ${index} does not match the claims schema`, {
        row: index,
        issues: result.error.issues.map((issue) => ({
          column: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }

    const row = result.data;
    columns.claim_id.push(row.claim_id);
    columns.patient_id.push(row.patient_id);
    columns.provider_id.push(row.provider_id);
    columns.service_date.push(row.service_date);
    columns.diagnosis_code.push(row.diagnosis_code);
    columns.procedure_code.push(row.procedure_code);
    columns.claim_amount.push(row.claim_amount);
    columns.status.push(row.status);
  });

  return { schema: CLAIMS_SCHEMA, numRows: rows.length, columns };
}

// Row-wise view of a claims table, in row order
export function claimsTableRows(table: ClaimsTable): ClaimRow[] {
  const { columns } = table;
  const rows: ClaimRow[] = [];
  for (let i = 0; i < table.numRows; i++) {
    rows.push({
      claim_id: columns.claim_id[i],
      patient_id: columns.patient_id[i],
      provider_id: columns.provider_id[i],
      service_date: columns.service_date[i],
      diagnosis_code: columns.diagnosis_code[i],
      procedure_code: columns.procedure_code[i],
      claim_amount: columns.claim_amount[i],
      status: columns.status[i],
    });
  }
  return rows;
}

/**
 * Generate claims for patients drawn (with replacement) from `patientIds`,
 * returned as a typed columnar table
 */
export function generateClaims(
  count: number,
  patientIds: readonly string[],
  context: GenerationContext
): ClaimsTable {
  assertRecordCount(count);
  assertPatientPool(patientIds, 'claims');

  const { faker, ids, window } = context;
  // claim id + provider id per claim
  ids.reserve(count * 2);

  logger.info('Generating claims', {
    count,
    patientPool: patientIds.length,
  });

  const claims: Claim[] = [];
  for (let i = 0; i < count; i++) {
    claims.push({
      claimId: ids.next(),
      patientId: faker.helpers.arrayElement(patientIds),
      providerId: ids.next(),
      serviceDate: toMidnightTimestamp(sampleCalendarDate(faker, window)),
      diagnosisCode: faker.helpers.arrayElement(CLAIM_DIAGNOSIS_CODES),
      procedureCode: faker.helpers.arrayElement(PROCEDURE_CODES),
      // Whole cents keep exactly two decimals
      claimAmount:
        faker.number.int({
          min: CLAIM_AMOUNT_CONSTRAINTS.MIN * 100,
          max: CLAIM_AMOUNT_CONSTRAINTS.MAX * 100,
        }) / 100,
      status: faker.helpers.arrayElement(CLAIM_STATUSES),
    });
  }

  return buildClaimsTable(claims.map(toClaimRow));
}
