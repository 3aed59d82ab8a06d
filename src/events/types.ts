interface LiveEventBase {
  occurredAt?: string;
}

export interface ConnectEvent extends LiveEventBase {
  type: 'connect';
  sessionId: string;
  hostIdentity: string;
}

export interface DisconnectEvent extends LiveEventBase {
  type: 'disconnect';
  sessionId: string;
}

export interface JoinEvent extends LiveEventBase {
  type: 'join';
  handle: string;
}

export interface LikeEvent extends LiveEventBase {
  type: 'like';
  handle: string;
  /** Likes batched into one event. Defaults to 1. */
  count?: number;
}

export interface CommentEvent extends LiveEventBase {
  type: 'comment';
  handle: string;
  text: string;
}

export interface ShareEvent extends LiveEventBase {
  type: 'share';
  handle: string;
}

export interface FollowEvent extends LiveEventBase {
  type: 'follow';
  handle: string;
}

export interface GiftEvent extends LiveEventBase {
  type: 'gift';
  handle: string;
  coinValue: number;
  giftName: string;
  /** Mid-streak ticks carry a running value, not the final one. */
  isOngoingStreak: boolean;
}

/** Snapshot of who is watching, sent once a minute. */
export interface ViewersEvent extends LiveEventBase {
  type: 'viewers';
  handles: string[];
}

export type EngagementEvent =
  | JoinEvent
  | LikeEvent
  | CommentEvent
  | ShareEvent
  | FollowEvent
  | GiftEvent;

export type LiveEvent = ConnectEvent | DisconnectEvent | EngagementEvent | ViewersEvent;

export type LiveEventType = LiveEvent['type'];
