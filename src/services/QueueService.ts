import { logger } from '../logger.js';
import { ErrorWithContext, IntakeClosedError } from '../lib/errors.js';
import { SettingKey, type SettingsCache } from '../lib/settings-cache.js';
import { clampPage, totalPagesFor } from '../lib/queue-renderer.js';
import { Tier, parseTier } from '../lib/tiers.js';
import type { EngagementIdentity, Submission, Submitter } from '../lib/types.js';
import {
  isValidPublicId,
  normalizeHandle,
  validateHandle,
  validateSubmissionFields,
} from '../lib/validation.js';
import {
  getErrorMessage,
  isConflictError,
  isNotFoundError,
  isTransientError,
  isValidationError,
} from '../utils/error-handlers.js';
import type { EngagementIdentityStore } from './EngagementIdentityStore.js';
import type { PriorityResolver } from './PriorityResolver.js';
import type { SubmissionStore } from './SubmissionStore.js';
import {
  ErrorCode,
  type LinkResult,
  type MoveResult,
  type QueuePage,
  type RemoveResult,
  type ServiceResult,
  type SubmitInput,
  type TakeNextResult,
} from './types.js';

const DEFAULT_PAGE_SIZE = 10;
const MAX_PAGE_SIZE = 50;

function fail<T>(code: ErrorCode, message: string, details?: Record<string, unknown>): ServiceResult<T> {
  return { success: false, error: { code, message, details } };
}

/**
 * Entry point for the command layer. Every call resolves to a
 * ServiceResult; store errors are mapped to error codes here.
 */
export class QueueService {
  constructor(
    private readonly store: SubmissionStore,
    private readonly resolver: PriorityResolver,
    private readonly identities: EngagementIdentityStore,
    private readonly settings: SettingsCache
  ) {}

  async submit(input: SubmitInput): Promise<ServiceResult<Submission>> {
    const validation = validateSubmissionFields(input.fields);
    if (!validation.valid) {
      return fail(ErrorCode.VALIDATION_ERROR, validation.error ?? 'Invalid submission');
    }

    try {
      if (!(await this.isIntakeOpen())) {
        throw new IntakeClosedError(Tier.STANDARD);
      }
      const engagementHandle = await this.identities.latestLinkedHandle(input.submitter.id);
      const submission = await this.store.create(input.submitter, { ...input.fields, engagementHandle });
      return { success: true, data: submission };
    } catch (error) {
      return this.toFailure(error, 'submit', { submitterId: input.submitter.id });
    }
  }

  async move(publicId: string, tierInput: string): Promise<ServiceResult<MoveResult>> {
    const target = parseTier(tierInput);
    if (!target) {
      return fail(ErrorCode.VALIDATION_ERROR, `Unknown tier: ${tierInput}`);
    }
    if (!isValidPublicId(publicId)) {
      return fail(ErrorCode.VALIDATION_ERROR, 'Submission ids are 6 digits');
    }

    const id = publicId.trim();
    try {
      const prior = await this.store.move(id, target);
      if (prior === null) {
        return fail(ErrorCode.NOT_FOUND, `No submission with id #${id}`);
      }
      return { success: true, data: { publicId: id, from: prior, to: target, changed: prior !== target } };
    } catch (error) {
      return this.toFailure(error, 'move', { publicId: id, target });
    }
  }

  async remove(publicId: string): Promise<ServiceResult<RemoveResult>> {
    if (!isValidPublicId(publicId)) {
      return fail(ErrorCode.VALIDATION_ERROR, 'Submission ids are 6 digits');
    }

    const id = publicId.trim();
    try {
      const prior = await this.store.remove(id);
      if (prior === null) {
        return fail(ErrorCode.NOT_FOUND, `No submission with id #${id}`);
      }
      return { success: true, data: { publicId: id, tier: prior } };
    } catch (error) {
      return this.toFailure(error, 'remove', { publicId: id });
    }
  }

  async takeNext(): Promise<ServiceResult<TakeNextResult>> {
    let submission: TakeNextResult['submission'];
    try {
      submission = await this.resolver.takeNext();
    } catch (error) {
      return this.toFailure(error, 'takeNext');
    }

    // The winner is already archived; it must reach the caller even if the count fails.
    let pendingApproval: number | null = null;
    try {
      pendingApproval = await this.resolver.pendingCount();
    } catch (error) {
      logger.warn('Pending approval count unavailable after take-next', {
        publicId: submission?.publicId,
        error: getErrorMessage(error),
      });
    }
    return { success: true, data: { submission, pendingApproval } };
  }

  async peekNext(): Promise<ServiceResult<Submission | null>> {
    try {
      return { success: true, data: await this.resolver.peekNext() };
    } catch (error) {
      return this.toFailure(error, 'peekNext');
    }
  }

  async clearTier(tierInput: string = Tier.STANDARD): Promise<ServiceResult<number>> {
    const tier = parseTier(tierInput);
    if (!tier) {
      return fail(ErrorCode.VALIDATION_ERROR, `Unknown tier: ${tierInput}`);
    }

    try {
      return { success: true, data: await this.store.clearTier(tier) };
    } catch (error) {
      return this.toFailure(error, 'clearTier', { tier });
    }
  }

  async query(tierInput: string): Promise<ServiceResult<Submission[]>> {
    const tier = parseTier(tierInput);
    if (!tier) {
      return fail(ErrorCode.VALIDATION_ERROR, `Unknown tier: ${tierInput}`);
    }

    try {
      return { success: true, data: await this.store.query(tier) };
    } catch (error) {
      return this.toFailure(error, 'query', { tier });
    }
  }

  async queryPage(
    tierInput: string,
    page: number,
    pageSize: number = DEFAULT_PAGE_SIZE
  ): Promise<ServiceResult<QueuePage>> {
    const tier = parseTier(tierInput);
    if (!tier) {
      return fail(ErrorCode.VALIDATION_ERROR, `Unknown tier: ${tierInput}`);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      return fail(ErrorCode.VALIDATION_ERROR, `Page size must be between 1 and ${MAX_PAGE_SIZE}`);
    }

    try {
      const totalItems = await this.store.countInTier(tier);
      const totalPages = totalPagesFor(totalItems, pageSize);
      const current = clampPage(page, totalPages);
      const items = await this.store.queryPage(tier, current, pageSize);
      return { success: true, data: { tier, page: current, totalPages, totalItems, items } };
    } catch (error) {
      return this.toFailure(error, 'queryPage', { tier, page });
    }
  }

  async mySubmissions(submitterId: string): Promise<ServiceResult<Submission[]>> {
    try {
      return { success: true, data: await this.store.listForSubmitter(submitterId) };
    } catch (error) {
      return this.toFailure(error, 'mySubmissions', { submitterId });
    }
  }

  async linkIdentity(submitter: Submitter, handleInput: string): Promise<ServiceResult<LinkResult>> {
    const validation = validateHandle(handleInput);
    if (!validation.valid) {
      return fail(ErrorCode.VALIDATION_ERROR, validation.error ?? 'Invalid handle');
    }

    const handle = normalizeHandle(handleInput);
    try {
      const linked = await this.identities.link(handle, submitter.id);
      // Also on a repeat link, so a retry after a failed assign completes it.
      const submissionsUpdated = await this.store.assignEngagementHandle(submitter.id, handle);
      return { success: true, data: { handle, alreadyLinked: !linked, submissionsUpdated } };
    } catch (error) {
      return this.toFailure(error, 'linkIdentity', { submitterId: submitter.id, handle });
    }
  }

  async unlinkIdentity(submitter: Submitter, handleInput: string): Promise<ServiceResult<LinkResult>> {
    const validation = validateHandle(handleInput);
    if (!validation.valid) {
      return fail(ErrorCode.VALIDATION_ERROR, validation.error ?? 'Invalid handle');
    }

    const handle = normalizeHandle(handleInput);
    try {
      await this.identities.unlink(handle, submitter.id);
      const submissionsUpdated = await this.store.clearEngagementHandle(submitter.id, handle);
      return { success: true, data: { handle, alreadyLinked: false, submissionsUpdated } };
    } catch (error) {
      return this.toFailure(error, 'unlinkIdentity', { submitterId: submitter.id, handle });
    }
  }

  async listLinkedHandles(submitterId: string): Promise<ServiceResult<EngagementIdentity[]>> {
    try {
      return { success: true, data: await this.identities.listLinked(submitterId) };
    } catch (error) {
      return this.toFailure(error, 'listLinkedHandles', { submitterId });
    }
  }

  async resetLifetimePoints(submitterId: string): Promise<ServiceResult<number>> {
    try {
      return { success: true, data: await this.identities.resetLifetimePoints(submitterId) };
    } catch (error) {
      return this.toFailure(error, 'resetLifetimePoints', { submitterId });
    }
  }

  async setStandardIntakeOpen(open: boolean): Promise<ServiceResult<boolean>> {
    try {
      await this.settings.set(SettingKey.STANDARD_INTAKE_OPEN, open ? '1' : '0');
      return { success: true, data: open };
    } catch (error) {
      return this.toFailure(error, 'setStandardIntakeOpen');
    }
  }

  async isStandardIntakeOpen(): Promise<ServiceResult<boolean>> {
    try {
      return { success: true, data: await this.isIntakeOpen() };
    } catch (error) {
      return this.toFailure(error, 'isStandardIntakeOpen');
    }
  }

  private isIntakeOpen(): Promise<boolean> {
    return this.settings.getFlag(SettingKey.STANDARD_INTAKE_OPEN, true);
  }

  private toFailure<T>(
    error: unknown,
    operation: string,
    context: Record<string, unknown> = {}
  ): ServiceResult<T> {
    const errorId = error instanceof ErrorWithContext ? error.errorId : undefined;
    const message = getErrorMessage(error);
    const details = error instanceof ErrorWithContext ? error.context : undefined;

    let code: ErrorCode;
    if (isValidationError(error)) {
      code = ErrorCode.VALIDATION_ERROR;
    } else if (isNotFoundError(error)) {
      code = ErrorCode.NOT_FOUND;
    } else if (isConflictError(error)) {
      code = ErrorCode.CONFLICT;
    } else if (isTransientError(error)) {
      code = ErrorCode.TRANSIENT;
    } else {
      code = ErrorCode.INTERNAL_ERROR;
    }

    const meta = { operation, errorId, code, error: message, ...context };
    if (code === ErrorCode.INTERNAL_ERROR) {
      logger.error('Queue operation failed', meta);
      return { success: false, error: { code, message: 'Something went wrong. Please try again.', errorId } };
    }

    logger.warn('Queue operation rejected', meta);
    return { success: false, error: { code, message, errorId, details } };
  }
}
