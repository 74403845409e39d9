// Patient demographics
export const Gender = {
  MALE: 'Male',
  FEMALE: 'Female',
} as const;

export type Gender = (typeof Gender)[keyof typeof Gender];

export const InsuranceType = {
  PRIVATE: 'Private',
  MEDICARE: 'Medicare',
  MEDICAID: 'Medicaid',
} as const;

export type InsuranceType = (typeof InsuranceType)[keyof typeof InsuranceType];

// ICD-10 codes recorded on EHR visits
export const DiagnosisCode = {
  TYPE_2_DIABETES: 'E11.9',
  HYPERTENSION: 'I10',
  ASTHMA: 'J45',
  CHRONIC_KIDNEY_DISEASE: 'N18.9',
  GENERAL_EXAM: 'Z00.0',
} as const;

export type DiagnosisCode = (typeof DiagnosisCode)[keyof typeof DiagnosisCode];

// Claims are never billed for a general exam
export type ClaimDiagnosisCode = Exclude<DiagnosisCode, typeof DiagnosisCode.GENERAL_EXAM>;

// CPT procedure codes
export const ProcedureCode = {
  OFFICE_VISIT: '99213',
  METABOLIC_PANEL: '80053',
  HBA1C: '83036',
  ECG: '93000',
} as const;

export type ProcedureCode = (typeof ProcedureCode)[keyof typeof ProcedureCode];

export const ClaimStatus = {
  PAID: 'Paid',
  DENIED: 'Denied',
  PENDING: 'Pending',
} as const;

export type ClaimStatus = (typeof ClaimStatus)[keyof typeof ClaimStatus];

// Output tiers, each written to its own folder
export const EnvironmentTier = {
  DEV: 'dev',
  PROD: 'prod',
} as const;

export type EnvironmentTier = (typeof EnvironmentTier)[keyof typeof EnvironmentTier];

export const ExportFormat = {
  CSV: 'csv',
  JSON: 'json',
  PARQUET: 'parquet',
} as const;

export type ExportFormat = (typeof ExportFormat)[keyof typeof ExportFormat];

// What to do when the bucket cannot be checked or created
export const BucketSetupMode = {
  BEST_EFFORT: 'best-effort',
  STRICT: 'strict',
} as const;

export type BucketSetupMode = (typeof BucketSetupMode)[keyof typeof BucketSetupMode];

export const StorageDriver = {
  S3: 's3',
  LOCAL: 'local',
} as const;

export type StorageDriver = (typeof StorageDriver)[keyof typeof StorageDriver];

// Inclusive range of calendar days that synthetic dates are drawn from
export interface RecordWindow {
  start: Date;
  end: Date;
}

export type RecordCounts = Record<EnvironmentTier, number>;
