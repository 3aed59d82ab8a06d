import { logger } from '../logger.js';
import { giftPoints, interactionPoints, rewardTierForGift } from '../lib/reward-tables.js';
import type { Tier } from '../lib/tiers.js';
import type { LiveSession } from '../lib/types.js';
import { normalizeHandle, validateHandle } from '../lib/validation.js';
import { getErrorMessage } from '../utils/error-handlers.js';
import type { EngagementEvent, LiveEvent } from '../events/types.js';
import type { EngagementIdentityStore } from './EngagementIdentityStore.js';
import type { StoreTransaction, SubmissionStore } from './SubmissionStore.js';

export type EngagementKind = EngagementEvent['type'];

export interface ParticipantSummary {
  handle: string;
  coins: number;
  points: number;
  events: number;
  watchMinutes: number;
}

export interface SessionSummary {
  sessionId: string;
  hostIdentity: string;
  startedAt: Date;
  endedAt: Date;
  eventCounts: Record<EngagementKind, number>;
  totalCoins: number;
  totalPoints: number;
  participants: ParticipantSummary[];
}

export interface SessionSummarySink {
  deliver(summary: SessionSummary): Promise<void>;
}

export type DiscardReason =
  | 'no-open-session'
  | 'session-already-open'
  | 'session-id-used'
  | 'session-mismatch'
  | 'ongoing-streak'
  | 'invalid-handle';

export type RewardOutcome =
  | { rewarded: true; tier: Tier; publicId: string; priorTier: Tier }
  | { rewarded: false; tier: Tier; reason: 'unlinked' | 'no-eligible-submission' | 'already-in-tier' };

export type EventOutcome =
  | { status: 'discarded'; reason: DiscardReason }
  | { status: 'session-opened'; session: LiveSession }
  | { status: 'session-closed'; summary: SessionSummary }
  | { status: 'viewers-recorded'; present: number }
  | { status: 'scored'; handle: string; points: number; affectedTiers: Tier[]; reward?: RewardOutcome };

export interface ScoreEngineOptions {
  /** How often accumulated watch minutes are written back. 0 disables the loop. */
  resortIntervalMs?: number;
  summarySink?: SessionSummarySink | null;
}

interface OpenSession {
  session: LiveSession;
  watchMinutes: Map<string, number>;
  seenHandles: Set<string>;
  eventCounts: Record<EngagementKind, number>;
  participants: Map<string, ParticipantSummary>;
}

function emptyCounts(): Record<EngagementKind, number> {
  return { join: 0, like: 0, comment: 0, share: 0, follow: 0, gift: 0 };
}

/** Coins first, then points, then handle for a stable order. */
export function compareParticipants(a: ParticipantSummary, b: ParticipantSummary): number {
  if (b.coins !== a.coins) {
    return b.coins - a.coins;
  }
  if (b.points !== a.points) {
    return b.points - a.points;
  }
  return a.handle.localeCompare(b.handle);
}

/**
 * Turns live events into score writes and gift rewards. Events run one at a
 * time in arrival order; anything arriving without an open session is
 * dropped.
 */
export class ScoreEngine {
  private active: OpenSession | null = null;
  private tail: Promise<void> = Promise.resolve();
  private resortTimer: NodeJS.Timeout | null = null;
  private readonly resortIntervalMs: number;
  private readonly summarySink: SessionSummarySink | null;

  constructor(
    private readonly store: SubmissionStore,
    private readonly identities: EngagementIdentityStore,
    options: ScoreEngineOptions = {}
  ) {
    this.resortIntervalMs = options.resortIntervalMs ?? 0;
    this.summarySink = options.summarySink ?? null;
  }

  handle(event: LiveEvent): Promise<EventOutcome> {
    return this.enqueue(() => this.process(event));
  }

  /** Closes whatever session is open. Resolves to null when none was. */
  endSession(): Promise<SessionSummary | null> {
    return this.enqueue(async () => (this.active ? this.close(this.active) : null));
  }

  /**
   * Writes watch scores for every Standard submission. Without a map, the
   * open session's accumulated minutes are used.
   */
  recomputeWatchScores(minutesByHandle?: ReadonlyMap<string, number>): Promise<number> {
    return this.enqueue(async () => {
      const minutes = minutesByHandle ?? this.active?.watchMinutes;
      if (!minutes) {
        return 0;
      }
      return this.store.applyWatchMinutes(minutes);
    });
  }

  getActiveSession(): LiveSession | null {
    return this.active?.session ?? null;
  }

  async stop(): Promise<void> {
    this.stopResortLoop();
    await this.tail;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async process(event: LiveEvent): Promise<EventOutcome> {
    switch (event.type) {
      case 'connect':
        return this.open(event.sessionId, event.hostIdentity);
      case 'disconnect':
        if (!this.active) {
          return { status: 'discarded', reason: 'no-open-session' };
        }
        if (this.active.session.sessionId !== event.sessionId) {
          return { status: 'discarded', reason: 'session-mismatch' };
        }
        return { status: 'session-closed', summary: await this.close(this.active) };
      case 'viewers':
        return this.recordViewers(event.handles);
      default:
        return this.score(event);
    }
  }

  private async open(sessionId: string, hostIdentity: string): Promise<EventOutcome> {
    if (this.active) {
      logger.warn('Connect received while another session is open', {
        openSessionId: this.active.session.sessionId,
        sessionId,
      });
      return { status: 'discarded', reason: 'session-already-open' };
    }

    const session = await this.identities.openSession(sessionId, hostIdentity);
    if (!session) {
      logger.warn('Session id already used, ignoring connect', { sessionId });
      return { status: 'discarded', reason: 'session-id-used' };
    }

    this.active = {
      session,
      watchMinutes: new Map(),
      seenHandles: new Set(),
      eventCounts: emptyCounts(),
      participants: new Map(),
    };
    this.startResortLoop();
    logger.info('Live session opened', { sessionId, hostIdentity });
    return { status: 'session-opened', session };
  }

  /**
   * Both writes are repeatable, so a failed close leaves the session open
   * and a redelivered disconnect finishes it.
   */
  private async close(open: OpenSession): Promise<SessionSummary> {
    await this.store.applyWatchMinutes(open.watchMinutes);
    const closed = await this.identities.closeSession(open.session.sessionId);
    this.stopResortLoop();
    this.active = null;

    const summary = this.buildSummary(open, closed?.endedAt ?? new Date());
    logger.info('Live session closed', {
      sessionId: summary.sessionId,
      totalCoins: summary.totalCoins,
      participants: summary.participants.length,
    });

    if (this.summarySink) {
      try {
        await this.summarySink.deliver(summary);
      } catch (error) {
        logger.error('Failed to deliver session summary', {
          sessionId: summary.sessionId,
          error: getErrorMessage(error),
        });
      }
    }
    return summary;
  }

  private async recordViewers(handles: string[]): Promise<EventOutcome> {
    const open = this.active;
    if (!open) {
      return { status: 'discarded', reason: 'no-open-session' };
    }

    const present = new Set<string>();
    for (const raw of handles) {
      if (validateHandle(raw).valid) {
        present.add(normalizeHandle(raw));
      }
    }

    // Writes first: a snapshot that fails here is redelivered without having counted.
    for (const handle of present) {
      if (!open.seenHandles.has(handle)) {
        await this.identities.recordActivity(handle, 0);
        open.seenHandles.add(handle);
      }
    }
    for (const handle of present) {
      open.watchMinutes.set(handle, (open.watchMinutes.get(handle) ?? 0) + 1);
      this.participant(open, handle).watchMinutes += 1;
    }
    return { status: 'viewers-recorded', present: present.size };
  }

  private async score(event: EngagementEvent): Promise<EventOutcome> {
    const open = this.active;
    if (!open) {
      return { status: 'discarded', reason: 'no-open-session' };
    }
    if (event.type === 'gift' && event.isOngoingStreak) {
      return { status: 'discarded', reason: 'ongoing-streak' };
    }
    if (!validateHandle(event.handle).valid) {
      logger.debug('Dropping event with unusable handle', { type: event.type });
      return { status: 'discarded', reason: 'invalid-handle' };
    }

    const handle = normalizeHandle(event.handle);
    const points = this.pointsFor(event);
    // Lifetime points, submission scores and any reward commit together, so
    // a redelivered event is never counted twice.
    const { affectedTiers, reward } = await this.store.transaction(async tx => {
      const identity = await this.identities.recordActivity(handle, points, tx.db);
      const tiers = await this.store.addInteractionPoints(handle, points, tx);
      const giftReward = event.type === 'gift'
        ? await this.applyGiftReward(identity.linkedSubmitterId, event.coinValue, tx)
        : undefined;
      return { affectedTiers: tiers, reward: giftReward };
    });

    open.seenHandles.add(handle);
    open.eventCounts[event.type] += 1;
    const row = this.participant(open, handle);
    row.points += points;
    row.events += 1;

    if (event.type !== 'gift') {
      return { status: 'scored', handle, points, affectedTiers };
    }

    row.coins += event.coinValue;
    if (reward?.rewarded === true) {
      logger.info('Gift reward applied', {
        publicId: reward.publicId,
        from: reward.priorTier,
        to: reward.tier,
        coins: event.coinValue,
      });
    }
    logger.debug('Gift scored', {
      handle,
      coins: event.coinValue,
      giftName: event.giftName,
      points,
      rewarded: reward?.rewarded ?? false,
    });
    return reward
      ? { status: 'scored', handle, points, affectedTiers, reward }
      : { status: 'scored', handle, points, affectedTiers };
  }

  private pointsFor(event: EngagementEvent): number {
    switch (event.type) {
      case 'gift':
        return giftPoints(event.coinValue);
      case 'like':
        return interactionPoints('like', event.count ?? 1);
      default:
        return interactionPoints(event.type);
    }
  }

  private async applyGiftReward(
    submitterId: string | null,
    coins: number,
    tx: StoreTransaction
  ): Promise<RewardOutcome | undefined> {
    const tier = rewardTierForGift(coins);
    if (!tier) {
      return undefined;
    }
    if (!submitterId) {
      return { rewarded: false, tier, reason: 'unlinked' };
    }

    const target = await this.store.findLatestEligibleForSubmitter(submitterId, tx);
    if (!target) {
      return { rewarded: false, tier, reason: 'no-eligible-submission' };
    }

    const priorTier = await this.store.move(target.publicId, tier, tx);
    if (priorTier === null) {
      return { rewarded: false, tier, reason: 'no-eligible-submission' };
    }
    if (priorTier === tier) {
      return { rewarded: false, tier, reason: 'already-in-tier' };
    }
    return { rewarded: true, tier, publicId: target.publicId, priorTier };
  }

  private participant(open: OpenSession, handle: string): ParticipantSummary {
    let row = open.participants.get(handle);
    if (!row) {
      row = { handle, coins: 0, points: 0, events: 0, watchMinutes: 0 };
      open.participants.set(handle, row);
    }
    return row;
  }

  private buildSummary(open: OpenSession, endedAt: Date): SessionSummary {
    const participants = [...open.participants.values()]
      .filter(row => row.events > 0 || row.watchMinutes > 0)
      .map(row => ({ ...row }))
      .sort(compareParticipants);

    return {
      sessionId: open.session.sessionId,
      hostIdentity: open.session.hostIdentity,
      startedAt: open.session.startedAt,
      endedAt,
      eventCounts: { ...open.eventCounts },
      totalCoins: participants.reduce((sum, row) => sum + row.coins, 0),
      totalPoints: participants.reduce((sum, row) => sum + row.points, 0),
      participants,
    };
  }

  private startResortLoop(): void {
    if (this.resortIntervalMs <= 0 || this.resortTimer) {
      return;
    }
    this.resortTimer = setInterval(() => {
      this.recomputeWatchScores().catch((error: unknown) => {
        logger.error('Watch score resort failed', { error: getErrorMessage(error) });
      });
    }, this.resortIntervalMs);
  }

  private stopResortLoop(): void {
    if (this.resortTimer) {
      clearInterval(this.resortTimer);
      this.resortTimer = null;
    }
  }
}
