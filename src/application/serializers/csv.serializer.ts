import { stringify } from 'csv-stringify/sync';
import type { Patient } from '../../domain/entities/index.js';

// Column order and headers of patient_data.csv
const PATIENT_COLUMNS: { key: keyof Patient; header: string }[] = [
  { key: 'patientId', header: 'patient_id' },
  { key: 'firstName', header: 'first_name' },
  { key: 'lastName', header: 'last_name' },
  { key: 'age', header: 'age' },
  { key: 'gender', header: 'gender' },
  { key: 'zipCode', header: 'zip_code' },
  { key: 'insuranceType', header: 'insurance_type' },
  { key: 'registrationDate', header: 'registration_date' },
];

export function serializePatientsCsv(patients: readonly Patient[]): string {
  return stringify([...patients], {
    header: true,
    columns: PATIENT_COLUMNS,
  });
}
