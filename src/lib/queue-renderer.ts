import { sanitizeMarkdown } from '../utils/v2-components.js';
import { Tier } from './tiers.js';
import type { Submission } from './types.js';

export interface RenderedQueuePage {
  tier: Tier;
  title: string;
  lines: string[];
  page: number;
  totalPages: number;
  totalItems: number;
}

const TIER_TITLES: Record<Tier, string> = {
  [Tier.T5_PLUS]: '5+ Skip Queue',
  [Tier.T4]: '4 Skip Queue',
  [Tier.T3]: '3 Skip Queue',
  [Tier.T2]: '2 Skip Queue',
  [Tier.T1]: '1 Skip Queue',
  [Tier.STANDARD]: 'Free Queue',
  [Tier.PENDING_APPROVAL]: 'Pending Approval',
  [Tier.ARCHIVED]: 'Recently Played',
};

export const EMPTY_QUEUE_LINE = 'The queue is empty.';

export function totalPagesFor(totalItems: number, pageSize: number): number {
  return Math.max(1, Math.ceil(totalItems / pageSize));
}

export function clampPage(page: number, totalPages: number): number {
  return Math.min(Math.max(1, Math.floor(page)), Math.max(1, totalPages));
}

function formatScore(score: number): string {
  return Number.isInteger(score) ? String(score) : score.toFixed(1);
}

/**
 * One line per submission, numbered by absolute queue position.
 * Standard lines carry the engagement score since it drives their order.
 */
export function formatQueueLine(submission: Submission, position: number): string {
  const title = sanitizeMarkdown(`${submission.artist} - ${submission.song}`);
  const base = `${position}. **${title}** by ${sanitizeMarkdown(submission.submitterName)} \`#${submission.publicId}\``;
  if (submission.tier === Tier.STANDARD && submission.totalScore > 0) {
    return `${base} (${formatScore(submission.totalScore)} pts)`;
  }
  return base;
}

export function renderQueuePage(
  tier: Tier,
  items: Submission[],
  page: number,
  pageSize: number,
  totalItems: number
): RenderedQueuePage {
  const totalPages = totalPagesFor(totalItems, pageSize);
  const current = clampPage(page, totalPages);
  const offset = (current - 1) * pageSize;

  return {
    tier,
    title: TIER_TITLES[tier],
    lines:
      items.length === 0
        ? [EMPTY_QUEUE_LINE]
        : items.map((item, index) => formatQueueLine(item, offset + index + 1)),
    page: current,
    totalPages,
    totalItems,
  };
}
