import type { Tier } from '../lib/tiers.js';
import type { RenderedQueuePage } from '../lib/queue-renderer.js';

/** Where a surface lives. `messageRef` is null until the first publish. */
export interface SurfaceTarget {
  surfaceKey: string;
  tier: Tier;
  channelRef: string;
  messageRef: string | null;
}

export type PublishOutcome =
  | { status: 'ok'; messageRef: string }
  | { status: 'target_gone' }
  | { status: 'rate_limited'; retryAfterMs?: number }
  | { status: 'transient'; reason: string };

export type VerifyOutcome =
  | { status: 'ok' }
  | { status: 'gone' }
  | { status: 'controls_missing' }
  | { status: 'transient'; reason: string };

/**
 * Renders and transmits queue pages. Implementations report failures as
 * outcomes; a thrown error is treated as transient by the caller.
 */
export interface DisplayBoundary {
  publish(target: SurfaceTarget, page: RenderedQueuePage): Promise<PublishOutcome>;
  verify(target: SurfaceTarget & { messageRef: string }): Promise<VerifyOutcome>;
}
