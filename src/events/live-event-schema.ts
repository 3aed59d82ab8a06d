import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import liveEventSchema from './live-event.schema.json';
import type { LiveEvent } from './types.js';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
  useDefaults: false,
  discriminator: true,
});

addFormats(ajv);

const validator = ajv.compile<LiveEvent>(liveEventSchema);

export function isLiveEvent(data: unknown): data is LiveEvent {
  return validator(data);
}

/** Last validation failure, formatted for a log line. */
export function describeLiveEventErrors(): string {
  return formatValidationErrors(validator.errors);
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return 'No validation errors';
  }

  return errors
    .map(err => {
      const path = err.instancePath || '/';
      const message = err.message || 'unknown error';
      return `${path}: ${message}`;
    })
    .join(', ');
}
