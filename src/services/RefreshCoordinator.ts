import { logger } from '../logger.js';
import { NotFoundError } from '../lib/errors.js';
import type { QueueChange, QueueEvents, ScoreChange } from '../lib/queue-events.js';
import { clampPage, renderQueuePage, totalPagesFor } from '../lib/queue-renderer.js';
import type { Tier } from '../lib/tiers.js';
import type { ViewPointer } from '../lib/types.js';
import { getErrorMessage } from '../utils/error-handlers.js';
import type { DisplayBoundary, PublishOutcome, SurfaceTarget } from '../display/types.js';
import type { SubmissionStore } from './SubmissionStore.js';
import type { NewViewPointer, ViewPointerStore } from './ViewPointerStore.js';

export type SurfaceState = 'inactive' | 'active' | 'dirty' | 'publishing';

export interface RefreshCoordinatorOptions {
  tickIntervalMs: number;
  publishSpacingMs: number;
  reconcileIntervalMs: number;
  pageSize: number;
  backoffBaseMs?: number;
  backoffCapMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface TickResult {
  skipped: boolean;
  published: number;
  failed: number;
  deactivated: number;
}

export interface ReconcileResult {
  skipped: boolean;
  verified: number;
  cleared: number;
  deferred: number;
}

export interface RefreshStats {
  surfaces: Record<SurfaceState, number>;
  retired: number;
  publishes: number;
  failures: number;
}

interface SurfaceEntry {
  pointer: ViewPointer;
  state: SurfaceState;
  /** Needs a publish on a coming tick. */
  due: boolean;
  changedDuringPublish: boolean;
  failures: number;
  notBefore: number;
}

const DEFAULT_BACKOFF_BASE_MS = 2_000;
const DEFAULT_BACKOFF_CAP_MS = 60_000;

function targetOf(pointer: ViewPointer): SurfaceTarget {
  return {
    surfaceKey: pointer.surfaceKey,
    tier: pointer.tier,
    channelRef: pointer.channelRef,
    messageRef: pointer.messageRef,
  };
}

/**
 * Keeps every registered surface showing its tier. Change signals only mark
 * surfaces dirty; publishing happens on the tick, one surface at a time with
 * a fixed gap between writes.
 */
export class RefreshCoordinator {
  private readonly surfaces = new Map<string, SurfaceEntry>();
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly backoffBaseMs: number;
  private readonly backoffCapMs: number;
  private unsubscribers: Array<() => void> = [];
  private tickTimer: NodeJS.Timeout | null = null;
  private reconcileTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<unknown> | null = null;
  private stopping = false;
  private publishes = 0;
  private failures = 0;

  constructor(
    private readonly store: SubmissionStore,
    private readonly pointers: ViewPointerStore,
    private readonly display: DisplayBoundary,
    private readonly events: QueueEvents,
    private readonly options: RefreshCoordinatorOptions
  ) {
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.backoffCapMs = options.backoffCapMs ?? DEFAULT_BACKOFF_CAP_MS;
  }

  /**
   * Loads persisted pointers, subscribes to change signals and, when
   * `schedule` is set, starts the tick and reconciliation timers after an
   * initial reconciliation pass.
   */
  async start(schedule: boolean = true): Promise<void> {
    this.stopping = false;
    await this.loadPointers();

    this.unsubscribers = [
      this.events.on('queueChanged', change => this.onQueueChanged(change)),
      this.events.on('scoresChanged', change => this.onScoresChanged(change)),
    ];

    if (!schedule) {
      return;
    }

    await this.reconcile();
    this.tickTimer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        logger.error('Refresh tick failed', { error: getErrorMessage(error) });
      });
    }, this.options.tickIntervalMs);
    this.reconcileTimer = setInterval(() => {
      this.reconcile().catch((error: unknown) => {
        logger.error('Reconciliation pass failed', { error: getErrorMessage(error) });
      });
    }, this.options.reconcileIntervalMs);

    logger.info('Refresh coordinator started', {
      surfaces: this.surfaces.size,
      tickIntervalMs: this.options.tickIntervalMs,
      publishSpacingMs: this.options.publishSpacingMs,
    });
  }

  /** Stops scheduling and waits for a tick or reconciliation already running. */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    if (this.reconcileTimer) {
      clearInterval(this.reconcileTimer);
      this.reconcileTimer = null;
    }
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];

    if (this.inFlight) {
      await this.inFlight;
    }
    logger.info('Refresh coordinator stopped');
  }

  async registerSurface(pointer: NewViewPointer): Promise<ViewPointer> {
    const saved = await this.pointers.register(pointer);
    this.surfaces.set(saved.surfaceKey, this.newEntry(saved));
    logger.info('Surface registered', { surfaceKey: saved.surfaceKey, tier: saved.tier });
    return saved;
  }

  async unregisterSurface(surfaceKey: string): Promise<boolean> {
    this.surfaces.delete(surfaceKey);
    const removed = await this.pointers.remove(surfaceKey);
    if (removed) {
      logger.info('Surface unregistered', { surfaceKey });
    }
    return removed;
  }

  /** Viewer navigation. The page is clamped again at publish time. */
  async setPage(surfaceKey: string, page: number): Promise<number> {
    const entry = this.surfaces.get(surfaceKey);
    if (!entry || !entry.pointer.active) {
      throw new NotFoundError('surface', surfaceKey);
    }

    const next = Math.max(1, Math.floor(page));
    entry.pointer.currentPage = next;
    await this.pointers.setPage(surfaceKey, next);
    this.markDirty(entry);
    return next;
  }

  getSurfaceState(surfaceKey: string): SurfaceState | null {
    return this.surfaces.get(surfaceKey)?.state ?? null;
  }

  getPointer(surfaceKey: string): ViewPointer | null {
    const entry = this.surfaces.get(surfaceKey);
    return entry ? { ...entry.pointer } : null;
  }

  getStats(): RefreshStats {
    const surfaces: Record<SurfaceState, number> = { inactive: 0, active: 0, dirty: 0, publishing: 0 };
    let retired = 0;
    for (const entry of this.surfaces.values()) {
      surfaces[entry.state] += 1;
      if (!entry.pointer.active) {
        retired += 1;
      }
    }
    return { surfaces, retired, publishes: this.publishes, failures: this.failures };
  }

  /** Publishes every due surface. Skipped while another pass is running. */
  async tick(): Promise<TickResult> {
    if (this.inFlight) {
      return { skipped: true, published: 0, failed: 0, deactivated: 0 };
    }
    const run = this.publishDue();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  /** Checks every bound message still exists and still has its controls. */
  async reconcile(): Promise<ReconcileResult> {
    if (this.inFlight) {
      return { skipped: true, verified: 0, cleared: 0, deferred: 0 };
    }
    const run = this.verifyAll();
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  private async loadPointers(): Promise<void> {
    const pointers = await this.pointers.list();
    this.surfaces.clear();
    for (const pointer of pointers) {
      const entry = this.newEntry(pointer);
      if (!pointer.active) {
        entry.due = false;
      }
      this.surfaces.set(pointer.surfaceKey, entry);
    }
  }

  private newEntry(pointer: ViewPointer): SurfaceEntry {
    return {
      pointer,
      state: 'inactive',
      due: pointer.active,
      changedDuringPublish: false,
      failures: 0,
      notBefore: 0,
    };
  }

  private onQueueChanged(change: QueueChange): void {
    for (const entry of this.entriesFor(change.tiers)) {
      entry.pointer.currentPage = 1;
      this.markDirty(entry);
    }
  }

  private onScoresChanged(change: ScoreChange): void {
    for (const entry of this.entriesFor(change.tiers)) {
      this.markDirty(entry);
    }
  }

  private entriesFor(tiers: Tier[]): SurfaceEntry[] {
    return [...this.surfaces.values()].filter(
      entry => entry.pointer.active && tiers.includes(entry.pointer.tier)
    );
  }

  private markDirty(entry: SurfaceEntry): void {
    entry.due = true;
    if (entry.state === 'publishing') {
      entry.changedDuringPublish = true;
    } else if (entry.state === 'active') {
      entry.state = 'dirty';
    }
  }

  private async publishDue(): Promise<TickResult> {
    const result: TickResult = { skipped: false, published: 0, failed: 0, deactivated: 0 };
    const due = [...this.surfaces.values()].filter(
      entry => entry.due && entry.pointer.active && entry.notBefore <= this.now()
    );

    for (let i = 0; i < due.length; i++) {
      if (this.stopping) {
        logger.info('Refresh stopping, abandoning remaining surfaces', { remaining: due.length - i });
        break;
      }
      if (i > 0) {
        await this.sleep(this.options.publishSpacingMs);
      }

      const entry = due[i];
      if (this.surfaces.get(entry.pointer.surfaceKey) !== entry) {
        continue;
      }

      const outcome = await this.publishOne(entry);
      switch (outcome) {
        case 'published':
          result.published += 1;
          break;
        case 'deactivated':
          result.deactivated += 1;
          break;
        case 'failed':
          result.failed += 1;
          break;
      }
    }
    return result;
  }

  private async publishOne(entry: SurfaceEntry): Promise<'published' | 'deactivated' | 'failed'> {
    const { pointer } = entry;
    const previousState = entry.state;
    entry.state = 'publishing';
    entry.changedDuringPublish = false;

    let outcome: PublishOutcome;
    let page = pointer.currentPage;
    try {
      const totalItems = await this.store.countInTier(pointer.tier);
      page = clampPage(pointer.currentPage, totalPagesFor(totalItems, this.options.pageSize));
      const items = await this.store.queryPage(pointer.tier, page, this.options.pageSize);
      const rendered = renderQueuePage(pointer.tier, items, page, this.options.pageSize, totalItems);
      outcome = await this.display.publish(targetOf(pointer), rendered);
    } catch (error) {
      outcome = { status: 'transient', reason: getErrorMessage(error) };
    }

    try {
      return await this.applyOutcome(entry, outcome, page);
    } catch (error) {
      logger.error('Failed to record publish outcome', {
        surfaceKey: pointer.surfaceKey,
        error: getErrorMessage(error),
      });
      this.scheduleRetry(entry, undefined);
      return 'failed';
    } finally {
      if (entry.state === 'publishing') {
        entry.state = previousState === 'inactive' ? 'inactive' : 'dirty';
      }
    }
  }

  private async applyOutcome(
    entry: SurfaceEntry,
    outcome: PublishOutcome,
    page: number
  ): Promise<'published' | 'deactivated' | 'failed'> {
    const { pointer } = entry;

    switch (outcome.status) {
      case 'ok':
        await this.pointers.savePublished(pointer.surfaceKey, outcome.messageRef, page);
        pointer.messageRef = outcome.messageRef;
        if (!entry.changedDuringPublish) {
          pointer.currentPage = page;
        }
        entry.failures = 0;
        entry.notBefore = 0;
        entry.due = entry.changedDuringPublish;
        entry.state = entry.changedDuringPublish ? 'dirty' : 'active';
        this.publishes += 1;
        return 'published';

      case 'target_gone':
        await this.pointers.deactivate(pointer.surfaceKey);
        pointer.messageRef = null;
        pointer.active = false;
        entry.due = false;
        entry.state = 'inactive';
        logger.warn('Surface target gone, deactivating until re-registered', {
          surfaceKey: pointer.surfaceKey,
          channelRef: pointer.channelRef,
        });
        return 'deactivated';

      case 'rate_limited':
        this.scheduleRetry(entry, outcome.retryAfterMs);
        logger.warn('Surface publish rate limited', {
          surfaceKey: pointer.surfaceKey,
          retryAfterMs: outcome.retryAfterMs,
          failures: entry.failures,
        });
        return 'failed';

      case 'transient':
        this.scheduleRetry(entry, undefined);
        logger.warn('Surface publish failed, will retry', {
          surfaceKey: pointer.surfaceKey,
          reason: outcome.reason,
          failures: entry.failures,
        });
        return 'failed';
    }
  }

  private scheduleRetry(entry: SurfaceEntry, retryAfterMs: number | undefined): void {
    entry.failures += 1;
    entry.due = true;
    entry.state = entry.pointer.messageRef === null ? 'inactive' : 'dirty';
    entry.notBefore = this.now() + (retryAfterMs ?? this.backoffDelay(entry.failures));
    this.failures += 1;
  }

  /** base, 2x base, 4x base ... capped. */
  backoffDelay(failures: number): number {
    const exponent = Math.max(0, failures - 1);
    return Math.min(this.backoffCapMs, this.backoffBaseMs * 2 ** exponent);
  }

  private async verifyAll(): Promise<ReconcileResult> {
    const result: ReconcileResult = { skipped: false, verified: 0, cleared: 0, deferred: 0 };
    const bound = [...this.surfaces.values()].filter(
      entry => entry.pointer.active && entry.pointer.messageRef !== null
    );

    for (let i = 0; i < bound.length; i++) {
      if (this.stopping) {
        break;
      }
      if (i > 0) {
        await this.sleep(this.options.publishSpacingMs);
      }

      const { pointer } = bound[i];
      const messageRef = pointer.messageRef;
      if (messageRef === null) {
        continue;
      }

      let status: string;
      try {
        status = (await this.display.verify({ ...targetOf(pointer), messageRef })).status;
      } catch (error) {
        logger.warn('Surface verification errored', {
          surfaceKey: pointer.surfaceKey,
          error: getErrorMessage(error),
        });
        status = 'transient';
      }

      if (status === 'ok') {
        result.verified += 1;
      } else if (status === 'gone' || status === 'controls_missing') {
        try {
          await this.pointers.deactivate(pointer.surfaceKey);
        } catch (error) {
          result.deferred += 1;
          logger.warn('Could not clear surface pointer, retrying next pass', {
            surfaceKey: pointer.surfaceKey,
            reason: status,
            error: getErrorMessage(error),
          });
          continue;
        }
        pointer.messageRef = null;
        pointer.active = false;
        bound[i].due = false;
        bound[i].state = 'inactive';
        result.cleared += 1;
        logger.warn('Cleared surface pointer that failed verification', {
          surfaceKey: pointer.surfaceKey,
          reason: status,
        });
      } else {
        result.deferred += 1;
        logger.info('Surface verification deferred to next pass', { surfaceKey: pointer.surfaceKey });
      }
    }

    logger.debug('Reconciliation pass complete', { ...result });
    return result;
  }
}
