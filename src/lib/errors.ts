import { nanoid } from 'nanoid';
import type { Tier } from './tiers.js';

/**
 * Generates a unique error ID with the format err_<random>
 */
export function generateErrorId(): string {
  return `err_${nanoid(12)}`;
}

/**
 * Base error class with contextual information for debugging
 */
export class ErrorWithContext extends Error {
  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {},
    public readonly errorId: string = generateErrorId()
  ) {
    super(message);
    this.name = 'ErrorWithContext';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends ErrorWithContext {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'ValidationError';
  }
}

/**
 * A referenced public id, handle or surface does not exist.
 * Safe to report; never retried.
 */
export class NotFoundError extends ErrorWithContext {
  constructor(
    public readonly resource: 'submission' | 'identity' | 'surface',
    public readonly key: string
  ) {
    super(`${resource} not found: ${key}`, { resource, key });
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ErrorWithContext {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'ConflictError';
  }
}

export class DuplicateActiveSubmissionError extends ConflictError {
  constructor(public readonly submitterId: string, tier: Tier) {
    super(`Submitter already has an active submission in ${tier}`, { submitterId, tier });
    this.name = 'DuplicateActiveSubmissionError';
  }
}

export class AlreadyLinkedError extends ConflictError {
  constructor(public readonly handle: string) {
    super(`Handle @${handle} is already linked to another submitter`, { handle });
    this.name = 'AlreadyLinkedError';
  }
}

export class IntakeClosedError extends ConflictError {
  constructor(tier: Tier) {
    super(`${tier} submissions are currently closed`, { tier });
    this.name = 'IntakeClosedError';
  }
}

/**
 * Contention or a busy lock. The caller (or the next scheduled pass) may retry.
 */
export class TransientError extends ErrorWithContext {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'TransientError';
  }
}

/**
 * The store could not be reached or returned something impossible.
 * Halts the affected task.
 */
export class FatalStoreError extends ErrorWithContext {
  constructor(message: string, cause?: unknown, context: Record<string, unknown> = {}) {
    super(message, { ...context, cause: cause instanceof Error ? cause.message : cause });
    this.name = 'FatalStoreError';
  }
}

/**
 * Extracts detailed information from an unknown error
 */
export function extractErrorDetails(error: unknown): {
  message: string;
  stack?: string;
  type: string;
} {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      type: error.name,
    };
  }

  return {
    message: String(error),
    type: 'UnknownError',
  };
}
