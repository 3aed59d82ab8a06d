import type { Tier } from './tiers.js';

export interface Submission {
  id: number;
  publicId: string;
  submitterId: string;
  submitterName: string;
  artist: string;
  song: string;
  contentRef: string;
  tier: Tier;
  submittedAt: Date;
  playedAt: Date | null;
  note: string | null;
  engagementHandle: string | null;
  watchScore: number;
  interactionScore: number;
  totalScore: number;
}

export interface Submitter {
  id: string;
  displayName: string;
}

export interface SubmissionFields {
  artist: string;
  song: string;
  contentRef: string;
  note?: string | null;
}

/** A submission taken off the queue, with the tier it was served from. */
export interface TakenSubmission extends Submission {
  priorTier: Tier;
}

export interface LiveSession {
  sessionId: string;
  hostIdentity: string;
  startedAt: Date;
  endedAt: Date | null;
}

export interface EngagementIdentity {
  handle: string;
  linkedSubmitterId: string | null;
  lifetimePoints: number;
  firstSeenAt: Date;
  linkedAt: Date | null;
}

export interface ViewPointer {
  surfaceKey: string;
  tier: Tier;
  channelRef: string;
  messageRef: string | null;
  currentPage: number;
  /** False once the bound message is confirmed gone; cleared by re-registering. */
  active: boolean;
  updatedAt: Date;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
