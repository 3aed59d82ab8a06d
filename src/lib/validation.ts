import { randomInt } from 'crypto';
import type { SubmissionFields } from './types.js';

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export const MAX_TITLE_FIELD_LENGTH = 100;
export const MAX_NOTE_LENGTH = 500;
const PUBLIC_ID_PATTERN = /^\d{6}$/;
const HANDLE_PATTERN = /^[a-z0-9._]{2,24}$/;

/** Six zero-padded digits, e.g. "004217". */
export function generatePublicId(): string {
  return randomInt(0, 1_000_000).toString().padStart(6, '0');
}

export function isValidPublicId(publicId: string): boolean {
  return PUBLIC_ID_PATTERN.test(publicId.trim());
}

/**
 * Live-platform handles are case-insensitive and often typed with a
 * leading "@".
 */
export function normalizeHandle(input: string): string {
  return input.trim().replace(/^@+/, '').toLowerCase();
}

export function validateHandle(input: string): ValidationResult {
  const handle = normalizeHandle(input);
  if (handle.length === 0) {
    return { valid: false, error: 'Handle cannot be empty' };
  }
  if (!HANDLE_PATTERN.test(handle)) {
    return {
      valid: false,
      error: 'Handle may only contain letters, digits, "." and "_" (2-24 characters)',
    };
  }
  return { valid: true };
}

function validateTitleField(name: string, value: string): ValidationResult {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return { valid: false, error: `${name} cannot be empty` };
  }
  if (trimmed.length > MAX_TITLE_FIELD_LENGTH) {
    return {
      valid: false,
      error: `${name} is too long (maximum ${MAX_TITLE_FIELD_LENGTH} characters)`,
    };
  }
  return { valid: true };
}

export function validateSubmissionFields(fields: SubmissionFields): ValidationResult {
  const artist = validateTitleField('Artist name', fields.artist);
  if (!artist.valid) {
    return artist;
  }

  const song = validateTitleField('Song name', fields.song);
  if (!song.valid) {
    return song;
  }

  if (fields.contentRef.trim().length === 0) {
    return { valid: false, error: 'A link or uploaded file is required' };
  }

  if (fields.note && fields.note.length > MAX_NOTE_LENGTH) {
    return {
      valid: false,
      error: `Note is too long (maximum ${MAX_NOTE_LENGTH} characters)`,
    };
  }

  return { valid: true };
}
