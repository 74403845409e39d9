import type { Patient } from '../../domain/entities/index.js';
import {
  GENDERS,
  INSURANCE_TYPES,
  PATIENT_CONSTRAINTS,
} from '../../domain/entities/index.js';
import { generationLogger as logger } from '../../shared/utils/logger.js';
import { assertRecordCount, sampleCalendarDate } from './generation-context.js';
import type { GenerationContext } from './generation-context.js';

/**
 * Generate patient demographics - one record per patient with a run-unique id
 */
export function generatePatients(count: number, context: GenerationContext): Patient[] {
  assertRecordCount(count);

  const { faker, ids, window } = context;
  ids.reserve(count);

  logger.info('Generating patient demographics', { count });

  const patients: Patient[] = [];
  for (let i = 0; i < count; i++) {
    patients.push({
      patientId: ids.next(),
      firstName: faker.person.firstName(),
      lastName: faker.person.lastName(),
      age: faker.number.int({ min: PATIENT_CONSTRAINTS.AGE.MIN, max: PATIENT_CONSTRAINTS.AGE.MAX }),
      gender: faker.helpers.arrayElement(GENDERS),
      zipCode: faker.location.zipCode('#####'),
      insuranceType: faker.helpers.arrayElement(INSURANCE_TYPES),
      registrationDate: sampleCalendarDate(faker, window),
    });
  }

  return patients;
}
