import { SerializationError } from '../../domain/errors/index.js';

const LINE_BREAK = /[\r\n]/;

/**
 * Join pre-encoded records into newline-delimited text, one record per line.
 * A record that itself spans lines would corrupt the file, so it is rejected.
 */
export function serializeJsonLines(units: readonly string[]): string {
  units.forEach((unit, index) => {
    if (LINE_BREAK.test(unit)) {
      throw new SerializationError(`Record ${index} contains a line break`, { record: index });
    }
  });

  return units.join('\n');
}
