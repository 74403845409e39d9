export class DomainError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Generation Errors
export class InvalidRecordCountError extends DomainError {
  constructor(count: number) {
    super(
      `Record count must be a non-negative integer, got ${count}`,
      'INVALID_RECORD_COUNT',
      { count }
    );
    this.name = 'InvalidRecordCountError';
  }
}

export class EmptyPatientPoolError extends DomainError {
  constructor(recordType: string) {
    super(
      `Cannot generate ${recordType} records without at least one patient identifier`,
      'EMPTY_PATIENT_POOL',
      { recordType }
    );
    this.name = 'EmptyPatientPoolError';
  }
}

export class UniquenessExhaustedError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UNIQUENESS_EXHAUSTED', details);
    this.name = 'UniquenessExhaustedError';
  }
}

export class MissingDiagnosisMappingError extends DomainError {
  constructor(code: string) {
    super(
      `No description mapped for diagnosis code '${code}'`,
      'MISSING_DIAGNOSIS_MAPPING',
      { diagnosisCode: code }
    );
    this.name = 'MissingDiagnosisMappingError';
  }
}

export class InvalidRecordWindowError extends DomainError {
  constructor(start: Date, end: Date) {
    super(
      'Record window must start on or before its end date',
      'INVALID_RECORD_WINDOW',
      { start: start.toISOString(), end: end.toISOString() }
    );
    this.name = 'InvalidRecordWindowError';
  }
}

// Serialization Errors
export class SchemaViolationError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SCHEMA_VIOLATION', details);
    this.name = 'SchemaViolationError';
  }
}

export class SerializationError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SERIALIZATION_ERROR', details);
    this.name = 'SerializationError';
  }
}

export class UnsupportedFormatError extends DomainError {
  constructor(format: string) {
    super(`Unsupported export format: '${format}'`, 'UNSUPPORTED_FORMAT', { format });
    this.name = 'UnsupportedFormatError';
  }
}

// Infrastructure Errors
export class StorageError extends DomainError {
  constructor(message: string = 'Storage operation failed', details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'STORAGE_ERROR', details, { cause });
    this.name = 'StorageError';
  }
}

export class BucketSetupError extends DomainError {
  constructor(bucket: string, cause?: unknown) {
    super(
      `Could not check or create bucket '${bucket}'`,
      'BUCKET_SETUP_FAILED',
      { bucket },
      { cause }
    );
    this.name = 'BucketSetupError';
  }
}
