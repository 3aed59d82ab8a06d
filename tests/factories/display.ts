import { jest } from '@jest/globals';
import type {
  DisplayBoundary,
  PublishOutcome,
  SurfaceTarget,
  VerifyOutcome,
} from '../../src/display/types.js';
import type { RenderedQueuePage } from '../../src/lib/queue-renderer.js';

export interface PublishCall {
  target: SurfaceTarget;
  page: RenderedQueuePage;
}

/**
 * Records every publish and answers from a per-surface script. Surfaces
 * with nothing scripted publish fine and get message id `msg-<surfaceKey>`.
 */
export class FakeDisplayBoundary implements DisplayBoundary {
  readonly published: PublishCall[] = [];
  readonly verified: string[] = [];
  private readonly publishScript = new Map<string, PublishOutcome[]>();
  private readonly verifyScript = new Map<string, VerifyOutcome>();

  readonly publish = jest.fn(async (target: SurfaceTarget, page: RenderedQueuePage): Promise<PublishOutcome> => {
    this.published.push({ target: { ...target }, page });
    const queued = this.publishScript.get(target.surfaceKey);
    const next = queued?.shift();
    return next ?? { status: 'ok', messageRef: target.messageRef ?? `msg-${target.surfaceKey}` };
  });

  readonly verify = jest.fn(
    async (target: SurfaceTarget & { messageRef: string }): Promise<VerifyOutcome> => {
      this.verified.push(target.surfaceKey);
      return this.verifyScript.get(target.surfaceKey) ?? { status: 'ok' };
    }
  );

  failNext(surfaceKey: string, ...outcomes: PublishOutcome[]): void {
    const queued = this.publishScript.get(surfaceKey) ?? [];
    queued.push(...outcomes);
    this.publishScript.set(surfaceKey, queued);
  }

  answerVerify(surfaceKey: string, outcome: VerifyOutcome): void {
    this.verifyScript.set(surfaceKey, outcome);
  }

  publishedKeys(): string[] {
    return this.published.map(call => call.target.surfaceKey);
  }
}
