import {
  ClaimStatus,
  DiagnosisCode,
  Gender,
  InsuranceType,
  ProcedureCode,
} from '../../shared/types/index.js';
import type {
  ClaimDiagnosisCode,
  EnvironmentTier,
  ExportFormat,
} from '../../shared/types/index.js';

// Patient demographics
export interface Patient {
  readonly patientId: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly age: number;
  readonly gender: Gender;
  readonly zipCode: string;
  readonly insuranceType: InsuranceType;
  readonly registrationDate: string; // yyyy-MM-dd
}

// A single clinic visit with vitals
export interface EhrVisit {
  readonly patientId: string;
  readonly visitDate: string; // yyyy-MM-dd
  readonly diagnosisCode: DiagnosisCode;
  readonly diagnosisDesc: string;
  readonly heartRate: number;
  readonly bloodPressure: string; // systolic/diastolic
  readonly temperature: number;
}

export interface Claim {
  readonly claimId: string;
  readonly patientId: string;
  readonly providerId: string;
  readonly serviceDate: Date; // midnight UTC
  readonly diagnosisCode: ClaimDiagnosisCode;
  readonly procedureCode: ProcedureCode;
  readonly claimAmount: number;
  readonly status: ClaimStatus;
}

// Adding a code to DiagnosisCode without a description here is a type error
export const DIAGNOSIS_DESCRIPTIONS: Readonly<Record<DiagnosisCode, string>> = {
  [DiagnosisCode.TYPE_2_DIABETES]: 'Type 2 diabetes mellitus',
  [DiagnosisCode.HYPERTENSION]: 'Essential hypertension',
  [DiagnosisCode.ASTHMA]: 'Asthma',
  [DiagnosisCode.CHRONIC_KIDNEY_DISEASE]: 'Chronic kidney disease',
  [DiagnosisCode.GENERAL_EXAM]: 'General medical exam',
};

export const GENDERS: readonly Gender[] = Object.values(Gender);
export const INSURANCE_TYPES: readonly InsuranceType[] = Object.values(InsuranceType);
export const EHR_DIAGNOSIS_CODES: readonly DiagnosisCode[] = Object.values(DiagnosisCode);
export const CLAIM_DIAGNOSIS_CODES: readonly ClaimDiagnosisCode[] = [
  DiagnosisCode.TYPE_2_DIABETES,
  DiagnosisCode.HYPERTENSION,
  DiagnosisCode.ASTHMA,
  DiagnosisCode.CHRONIC_KIDNEY_DISEASE,
];
export const PROCEDURE_CODES: readonly ProcedureCode[] = Object.values(ProcedureCode);
export const CLAIM_STATUSES: readonly ClaimStatus[] = Object.values(ClaimStatus);

// Inclusive value ranges for generated fields
export const PATIENT_CONSTRAINTS = {
  AGE: { MIN: 0, MAX: 100 },
} as const;

export const VITALS_CONSTRAINTS = {
  HEART_RATE: { MIN: 60, MAX: 100 },
  SYSTOLIC: { MIN: 110, MAX: 140 },
  DIASTOLIC: { MIN: 70, MAX: 90 },
  TEMPERATURE: { MIN: 97.0, MAX: 99.5 },
} as const;

export const CLAIM_AMOUNT_CONSTRAINTS = {
  MIN: 100,
  MAX: 5000,
} as const;

export const DEFAULT_RECORD_WINDOW_START = '2020-01-01';

// Claims table column schema, in file order
export const ClaimsColumnType = {
  STRING: 'string',
  TIMESTAMP_MS: 'timestamp[ms]',
  FLOAT64: 'float64',
} as const;

export type ClaimsColumnType = (typeof ClaimsColumnType)[keyof typeof ClaimsColumnType];

export const CLAIMS_SCHEMA = [
  { name: 'claim_id', type: ClaimsColumnType.STRING },
  { name: 'patient_id', type: ClaimsColumnType.STRING },
  { name: 'provider_id', type: ClaimsColumnType.STRING },
  { name: 'service_date', type: ClaimsColumnType.TIMESTAMP_MS },
  { name: 'diagnosis_code', type: ClaimsColumnType.STRING },
  { name: 'procedure_code', type: ClaimsColumnType.STRING },
  { name: 'claim_amount', type: ClaimsColumnType.FLOAT64 },
  { name: 'status', type: ClaimsColumnType.STRING },
] as const;

export type ClaimsColumnName = (typeof CLAIMS_SCHEMA)[number]['name'];

// One claim as stored in the claims table
export interface ClaimRow {
  claim_id: string;
  patient_id: string;
  provider_id: string;
  service_date: Date;
  diagnosis_code: string;
  procedure_code: string;
  claim_amount: number;
  status: string;
}

export interface ClaimsColumns {
  claim_id: string[];
  patient_id: string[];
  provider_id: string[];
  service_date: Date[];
  diagnosis_code: string[];
  procedure_code: string[];
  claim_amount: number[];
  status: string[];
}

// Columnar claims data with its declared schema
export interface ClaimsTable {
  readonly schema: typeof CLAIMS_SCHEMA;
  readonly numRows: number;
  readonly columns: Readonly<ClaimsColumns>;
}

// Fixed file names written into every tier folder
export const ARTIFACTS = {
  PATIENTS: { filename: 'patient_data.csv', format: 'csv' },
  EHR: { filename: 'ehr_data.json', format: 'json' },
  CLAIMS: { filename: 'claims_data.parquet', format: 'parquet' },
} as const satisfies Record<string, { filename: string; format: ExportFormat }>;

export function tierFolder(tier: EnvironmentTier): string {
  return `${tier}/`;
}
