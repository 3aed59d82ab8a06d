import { EventEmitter } from 'events';
import type { Tier } from './tiers.js';

export interface QueueChange {
  tiers: Tier[];
  reason: 'create' | 'move' | 'remove' | 'clear' | 'take-next';
  publicId?: string;
}

export interface ScoreChange {
  tiers: Tier[];
  reason: 'interaction' | 'watch-time';
}

interface QueueEventMap {
  queueChanged: [QueueChange];
  scoresChanged: [ScoreChange];
}

/**
 * In-process change signals. `queueChanged` follows a committed structural
 * mutation; `scoresChanged` follows a committed score write.
 */
export class QueueEvents {
  private readonly emitter = new EventEmitter();

  emitQueueChanged(change: QueueChange): void {
    this.emitter.emit('queueChanged', change);
  }

  emitScoresChanged(change: ScoreChange): void {
    this.emitter.emit('scoresChanged', change);
  }

  on<K extends keyof QueueEventMap>(event: K, listener: (...args: QueueEventMap[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }
}
