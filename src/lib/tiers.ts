/**
 * Queue tiers. Dispatch tiers are served highest first; `PendingApproval`
 * and `Archived` sit outside the dispatch order.
 */
export enum Tier {
  T5_PLUS = 'T5plus',
  T4 = 'T4',
  T3 = 'T3',
  T2 = 'T2',
  T1 = 'T1',
  STANDARD = 'Standard',
  PENDING_APPROVAL = 'PendingApproval',
  ARCHIVED = 'Archived',
}

export const DISPATCH_ORDER: readonly Tier[] = [
  Tier.T5_PLUS,
  Tier.T4,
  Tier.T3,
  Tier.T2,
  Tier.T1,
  Tier.STANDARD,
];

const TIER_VALUES = new Set<string>(Object.values(Tier));

const TIER_ALIASES: Record<string, Tier> = {
  't5+': Tier.T5_PLUS,
  't5plus': Tier.T5_PLUS,
  '5plus': Tier.T5_PLUS,
  '5+': Tier.T5_PLUS,
  't4': Tier.T4,
  't3': Tier.T3,
  't2': Tier.T2,
  't1': Tier.T1,
  'standard': Tier.STANDARD,
  'free': Tier.STANDARD,
  'pendingapproval': Tier.PENDING_APPROVAL,
  'pending': Tier.PENDING_APPROVAL,
  'archived': Tier.ARCHIVED,
  'played': Tier.ARCHIVED,
};

export function isTier(value: unknown): value is Tier {
  return typeof value === 'string' && TIER_VALUES.has(value);
}

/**
 * Resolves caller input such as "T5+", "free" or "Pending" to a tier.
 * Returns null for anything unrecognised.
 */
export function parseTier(input: string): Tier | null {
  if (isTier(input)) {
    return input;
  }
  const key = input.trim().toLowerCase().replace(/[\s_-]+/g, '');
  return TIER_ALIASES[key] ?? null;
}

/**
 * SQL ORDER BY clause implementing each tier's ordering key.
 * `id` is the final tie-breaker since it is monotonic.
 */
export function orderByClause(tier: Tier): string {
  switch (tier) {
    case Tier.STANDARD:
      return 'total_score DESC, submitted_at ASC, id ASC';
    case Tier.ARCHIVED:
      return 'played_at DESC, id DESC';
    default:
      return 'submitted_at ASC, id ASC';
  }
}
