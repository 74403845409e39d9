import { Faker, en } from '@faker-js/faker';
import { addDays, differenceInCalendarDays, format, startOfDay } from 'date-fns';
import type { RecordWindow } from '../../shared/types/index.js';
import {
  EmptyPatientPoolError,
  InvalidRecordCountError,
  InvalidRecordWindowError,
} from '../../domain/errors/index.js';
import { recordCountSchema } from '../validators/index.js';
import { UniqueIdRegistry, UUID_V4_CAPACITY } from './unique-id.js';

/**
 * Everything a generator draws from. Passed in explicitly so a run can be
 * reproduced from a seed and nothing is shared between runs by accident.
 */
export interface GenerationContext {
  faker: Faker;
  ids: UniqueIdRegistry;
  window: RecordWindow;
}

export function createFaker(seed?: number): Faker {
  const faker = new Faker({ locale: [en] });
  if (seed !== undefined) {
    faker.seed(seed);
  }
  return faker;
}

export function createUuidRegistry(faker: Faker): UniqueIdRegistry {
  return new UniqueIdRegistry(() => faker.string.uuid(), { capacity: UUID_V4_CAPACITY });
}

export function createGenerationContext(faker: Faker, window: RecordWindow): GenerationContext {
  return { faker, ids: createUuidRegistry(faker), window };
}

/**
 * Number of whole calendar days between the window's ends. Throws when the
 * window ends before the day it starts on.
 */
export function assertRecordWindow(window: RecordWindow): number {
  const span = differenceInCalendarDays(window.end, startOfDay(window.start));
  if (span < 0) {
    throw new InvalidRecordWindowError(window.start, window.end);
  }
  return span;
}

/**
 * Uniformly picks a calendar day in the window, both ends included.
 * Returned as yyyy-MM-dd.
 */
export function sampleCalendarDate(faker: Faker, window: RecordWindow): string {
  const start = startOfDay(window.start);
  const span = assertRecordWindow(window);

  const offset = faker.number.int({ min: 0, max: span });
  return format(addDays(start, offset), 'yyyy-MM-dd');
}

// Calendar day at 00:00:00.000 UTC
export function toMidnightTimestamp(day: string): Date {
  return new Date(`${day}T00:00:00.000Z`);
}

export function assertRecordCount(count: number): void {
  if (!recordCountSchema.safeParse(count).success) {
    throw new InvalidRecordCountError(count);
  }
}

export function assertPatientPool(patientIds: readonly string[], recordType: string): void {
  if (patientIds.length === 0) {
    throw new EmptyPatientPoolError(recordType);
  }
}
