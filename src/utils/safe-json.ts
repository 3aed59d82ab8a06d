import { logger } from '../logger.js';

const DANGEROUS_KEYS = ['__proto__', 'constructor', 'prototype'];

export class SafeJSONError extends Error {
  constructor(message: string, public readonly reason: 'parse' | 'validation') {
    super(message);
    this.name = 'SafeJSONError';
  }
}

function isDangerousKey(key: string): boolean {
  return DANGEROUS_KEYS.includes(key);
}

function reviver(key: string, value: unknown): unknown {
  if (key && isDangerousKey(key)) {
    logger.warn('Blocked dangerous key during JSON parsing', { key });
    return undefined;
  }
  return value;
}

/**
 * Parses untrusted JSON with prototype-polluting keys stripped, then narrows
 * the result through `guard`.
 */
export function safeJSONParse<T>(text: string, guard: (data: unknown) => data is T): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text, reviver);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SafeJSONError(`Failed to parse JSON: ${message}`, 'parse');
  }

  if (!guard(parsed)) {
    throw new SafeJSONError('JSON validation failed', 'validation');
  }
  return parsed;
}
