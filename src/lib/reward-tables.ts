import { Tier } from './tiers.js';

export type InteractionKind = 'like' | 'comment' | 'share' | 'follow' | 'join';

export const INTERACTION_POINTS: Readonly<Record<InteractionKind, number>> = {
  like: 1,
  comment: 2,
  share: 5,
  follow: 10,
  join: 0,
};

export interface GiftTierThreshold {
  minCoins: number;
  tier: Tier;
}

/** Sorted by threshold, highest first; the first match wins. */
export const GIFT_TIER_THRESHOLDS: readonly GiftTierThreshold[] = [
  { minCoins: 6000, tier: Tier.T5_PLUS },
  { minCoins: 5000, tier: Tier.T4 },
  { minCoins: 4000, tier: Tier.T3 },
  { minCoins: 2000, tier: Tier.T2 },
  { minCoins: 1000, tier: Tier.T1 },
];

/** Gifts below this many coins earn double points and no tier reward. */
const GIFT_BONUS_CEILING = 1000;

/**
 * Points for a gift of `coins`: double below 1000 coins, face value from
 * 1000 up. 999 coins therefore scores 1998 while 1000 scores 1000.
 */
export function giftPoints(coins: number): number {
  if (coins <= 0) {
    return 0;
  }
  return coins < GIFT_BONUS_CEILING ? coins * 2 : coins;
}

export function rewardTierForGift(coins: number): Tier | null {
  const match = GIFT_TIER_THRESHOLDS.find(threshold => coins >= threshold.minCoins);
  return match ? match.tier : null;
}

export function interactionPoints(kind: InteractionKind, count: number = 1): number {
  return INTERACTION_POINTS[kind] * Math.max(0, count);
}
