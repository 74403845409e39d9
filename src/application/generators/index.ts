export { generatePatients } from './patient.generator.js';
export { generateEhrVisits, encodeEhrVisit, describeDiagnosis } from './ehr.generator.js';
export {
  generateClaims,
  buildClaimsTable,
  claimsTableRows,
  toClaimRow,
} from './claims.generator.js';
export {
  assertRecordWindow,
  createFaker,
  createGenerationContext,
  createUuidRegistry,
  sampleCalendarDate,
  toMidnightTimestamp,
} from './generation-context.js';
export type { GenerationContext } from './generation-context.js';
export { UniqueIdRegistry, UUID_V4_CAPACITY } from './unique-id.js';
