import { logger } from '../logger.js';
import { TransientError } from '../lib/errors.js';
import { DISPATCH_ORDER, Tier } from '../lib/tiers.js';
import type { Submission, TakenSubmission } from '../lib/types.js';
import type { LockProvider } from '../utils/distributed-lock.js';
import type { SubmissionStore } from './SubmissionStore.js';

export const TAKE_NEXT_LOCK_KEY = 'queue:take-next';
const MAX_CLAIM_ATTEMPTS = 5;

export interface PriorityResolverOptions {
  lock?: LockProvider | null;
  maxClaimAttempts?: number;
}

/**
 * Picks the next submission to review. The claim is a conditional update on
 * the tier the winner was observed in, so two callers racing for the same
 * row cannot both archive it.
 */
export class PriorityResolver {
  private readonly lock: LockProvider | null;
  private readonly maxClaimAttempts: number;

  constructor(
    private readonly store: SubmissionStore,
    options: PriorityResolverOptions = {}
  ) {
    this.lock = options.lock ?? null;
    this.maxClaimAttempts = options.maxClaimAttempts ?? MAX_CLAIM_ATTEMPTS;
  }

  async takeNext(): Promise<TakenSubmission | null> {
    if (!this.lock) {
      return this.claimNext();
    }

    let ran = false;
    const taken = await this.lock.withLock(TAKE_NEXT_LOCK_KEY, async () => {
      ran = true;
      return this.claimNext();
    });
    if (!ran) {
      throw new TransientError('Another reviewer is taking the next submission', {
        lockKey: TAKE_NEXT_LOCK_KEY,
      });
    }
    return taken;
  }

  async peekNext(): Promise<Submission | null> {
    for (const tier of DISPATCH_ORDER) {
      const head = await this.store.first(tier);
      if (head) {
        return head;
      }
    }
    return null;
  }

  pendingCount(): Promise<number> {
    return this.store.countInTier(Tier.PENDING_APPROVAL);
  }

  private async claimNext(): Promise<TakenSubmission | null> {
    for (let attempt = 1; attempt <= this.maxClaimAttempts; attempt++) {
      const winner = await this.peekNext();
      if (!winner) {
        return null;
      }

      const archived = await this.store.archiveIfInTier(winner.id, winner.tier);
      if (archived) {
        logger.info('Submission taken for review', {
          publicId: archived.publicId,
          priorTier: winner.tier,
        });
        return { ...archived, priorTier: winner.tier };
      }

      logger.debug('Lost take-next race, selecting again', { publicId: winner.publicId, attempt });
    }

    throw new TransientError('Queue head kept changing during take-next', {
      attempts: this.maxClaimAttempts,
    });
  }
}
