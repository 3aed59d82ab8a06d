import { describe, it, expect } from '@jest/globals';
import { Tier } from '../../src/lib/tiers.js';
import { giftPoints, interactionPoints, rewardTierForGift } from '../../src/lib/reward-tables.js';

describe('reward tables', () => {
  describe('giftPoints', () => {
    it('doubles gifts under 1000 coins', () => {
      expect(giftPoints(1)).toBe(2);
      expect(giftPoints(500)).toBe(1000);
      expect(giftPoints(999)).toBe(1998);
    });

    it('counts gifts from 1000 coins at face value', () => {
      expect(giftPoints(1000)).toBe(1000);
      expect(giftPoints(6000)).toBe(6000);
    });

    it('scores nothing for zero or negative coins', () => {
      expect(giftPoints(0)).toBe(0);
      expect(giftPoints(-5)).toBe(0);
    });
  });

  describe('rewardTierForGift', () => {
    it.each([
      [999, null],
      [1000, Tier.T1],
      [1999, Tier.T1],
      [2000, Tier.T2],
      [3999, Tier.T2],
      [4000, Tier.T3],
      [5000, Tier.T4],
      [5999, Tier.T4],
      [6000, Tier.T5_PLUS],
      [50000, Tier.T5_PLUS],
    ])('maps %i coins to %s', (coins, tier) => {
      expect(rewardTierForGift(coins)).toBe(tier);
    });
  });

  describe('interactionPoints', () => {
    it('uses the fixed table', () => {
      expect(interactionPoints('like')).toBe(1);
      expect(interactionPoints('comment')).toBe(2);
      expect(interactionPoints('share')).toBe(5);
      expect(interactionPoints('follow')).toBe(10);
      expect(interactionPoints('join')).toBe(0);
    });

    it('multiplies batched likes', () => {
      expect(interactionPoints('like', 15)).toBe(15);
      expect(interactionPoints('like', -3)).toBe(0);
    });
  });
});
