import { z } from 'zod';
import {
  CLAIM_AMOUNT_CONSTRAINTS,
  CLAIM_DIAGNOSIS_CODES,
  CLAIM_STATUSES,
  PROCEDURE_CODES,
} from '../../domain/entities/index.js';
import type { ClaimRow } from '../../domain/entities/index.js';

// Common validators
const uuidSchema = z.string().uuid('Invalid UUID format');

export const recordCountSchema = z.number().int().nonnegative();

// ============ CLAIMS TABLE SCHEMA ============

// Row shape enforced before data enters the claims table
export const claimRowSchema = z
  .object({
    claim_id: uuidSchema,
    patient_id: z.string().min(1),
    provider_id: uuidSchema,
    service_date: z
      .date()
      .refine((date) => !Number.isNaN(date.getTime()), { message: 'Invalid timestamp' }),
    diagnosis_code: z.string().refine(
      (code) => CLAIM_DIAGNOSIS_CODES.some((known) => known === code),
      { message: 'Invalid diagnosis code' }
    ),
    procedure_code: z.string().refine(
      (code) => PROCEDURE_CODES.some((known) => known === code),
      { message: 'Invalid procedure code' }
    ),
    claim_amount: z
      .number()
      .finite()
      .min(CLAIM_AMOUNT_CONSTRAINTS.MIN, `Amount must be at least ${CLAIM_AMOUNT_CONSTRAINTS.MIN}`)
      .max(CLAIM_AMOUNT_CONSTRAINTS.MAX, `Amount cannot exceed ${CLAIM_AMOUNT_CONSTRAINTS.MAX}`),
    status: z.string().refine(
      (status) => CLAIM_STATUSES.some((known) => known === status),
      { message: 'Invalid claim status' }
    ),
  })
  .strict() satisfies z.ZodType<ClaimRow>;
