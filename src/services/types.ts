import type { Submission, SubmissionFields, Submitter, TakenSubmission } from '../lib/types.js';
import type { Tier } from '../lib/tiers.js';

export interface ServiceResult<T> {
  success: boolean;
  data?: T;
  error?: ServiceError;
}

export interface ServiceError {
  code: ErrorCode;
  message: string;
  errorId?: string;
  details?: Record<string, unknown>;
}

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  TRANSIENT = 'TRANSIENT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface SubmitInput {
  submitter: Submitter;
  fields: SubmissionFields;
}

export interface MoveResult {
  publicId: string;
  from: Tier;
  to: Tier;
  changed: boolean;
}

export interface RemoveResult {
  publicId: string;
  tier: Tier;
}

export interface TakeNextResult {
  submission: TakenSubmission | null;
  /** Null when the count could not be read after the take. */
  pendingApproval: number | null;
}

export interface QueuePage {
  tier: Tier;
  page: number;
  totalPages: number;
  totalItems: number;
  items: Submission[];
}

export interface LinkResult {
  handle: string;
  alreadyLinked: boolean;
  submissionsUpdated: number;
}
