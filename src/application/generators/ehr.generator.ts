import type { EhrVisit } from '../../domain/entities/index.js';
import {
  DIAGNOSIS_DESCRIPTIONS,
  EHR_DIAGNOSIS_CODES,
  VITALS_CONSTRAINTS,
} from '../../domain/entities/index.js';
import type { DiagnosisCode } from '../../shared/types/index.js';
import { MissingDiagnosisMappingError } from '../../domain/errors/index.js';
import { generationLogger as logger } from '../../shared/utils/logger.js';
import {
  assertPatientPool,
  assertRecordCount,
  sampleCalendarDate,
} from './generation-context.js';
import type { GenerationContext } from './generation-context.js';

function isDiagnosisCode(code: string): code is DiagnosisCode {
  return Object.hasOwn(DIAGNOSIS_DESCRIPTIONS, code);
}

export function describeDiagnosis(code: string): string {
  if (!isDiagnosisCode(code)) {
    throw new MissingDiagnosisMappingError(code);
  }
  return DIAGNOSIS_DESCRIPTIONS[code];
}

/**
 * Generate EHR visits for patients drawn (with replacement) from `patientIds`
 */
export function generateEhrVisits(
  count: number,
  patientIds: readonly string[],
  context: GenerationContext
): EhrVisit[] {
  assertRecordCount(count);
  assertPatientPool(patientIds, 'EHR');

  const { faker, window } = context;
  const { HEART_RATE, SYSTOLIC, DIASTOLIC, TEMPERATURE } = VITALS_CONSTRAINTS;

  logger.info('Generating electronic health records', {
    count,
    patientPool: patientIds.length,
  });

  const visits: EhrVisit[] = [];
  for (let i = 0; i < count; i++) {
    const diagnosisCode = faker.helpers.arrayElement(EHR_DIAGNOSIS_CODES);
    const systolic = faker.number.int({ min: SYSTOLIC.MIN, max: SYSTOLIC.MAX });
    const diastolic = faker.number.int({ min: DIASTOLIC.MIN, max: DIASTOLIC.MAX });

    visits.push({
      patientId: faker.helpers.arrayElement(patientIds),
      visitDate: sampleCalendarDate(faker, window),
      diagnosisCode,
      diagnosisDesc: describeDiagnosis(diagnosisCode),
      heartRate: faker.number.int({ min: HEART_RATE.MIN, max: HEART_RATE.MAX }),
      bloodPressure: `${systolic}/${diastolic}`,
      // Tenths of a degree keep exactly one decimal
      temperature: faker.number.int({ min: TEMPERATURE.MIN * 10, max: TEMPERATURE.MAX * 10 }) / 10,
    });
  }

  return visits;
}

/**
 * One visit as a single-line JSON document, keyed the way the EHR export is read
 */
export function encodeEhrVisit(visit: EhrVisit): string {
  return JSON.stringify({
    patient_id: visit.patientId,
    visit_date: visit.visitDate,
    diagnosis_code: visit.diagnosisCode,
    diagnosis_desc: visit.diagnosisDesc,
    heart_rate: visit.heartRate,
    blood_pressure: visit.bloodPressure,
    temperature: visit.temperature,
  });
}
