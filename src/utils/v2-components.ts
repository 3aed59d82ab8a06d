import {
  MessageFlags,
  ContainerBuilder,
  SeparatorBuilder,
} from 'discord.js';
import { Tier } from '../lib/tiers.js';

/**
 * Accent colors per tier for Components v2 containers.
 *
 * @example
 * const container = createContainer(TIER_COLORS[Tier.T5_PLUS]);
 */
export const TIER_COLORS: Record<Tier, number> = {
  [Tier.T5_PLUS]: 0xed4245,
  [Tier.T4]: 0xffa500,
  [Tier.T3]: 0xfee75c,
  [Tier.T2]: 0x57f287,
  [Tier.T1]: 0x3498db,
  [Tier.STANDARD]: 0x5865f2,
  [Tier.PENDING_APPROVAL]: 0x9b59b6,
  [Tier.ARCHIVED]: 0x95a5a6,
};

export const V2_ICONS = {
  NAV_PREVIOUS: '◀',
  NAV_NEXT: '▶',
  COINS: '\u{1FA99}',
  CROWN: '\u{1F451}',
} as const;

export const V2_LIMITS = {
  MAX_TEXT_DISPLAY_LENGTH: 4000,
  MAX_CUSTOM_ID_LENGTH: 100,
} as const;

export interface V2MessageFlagsOptions {
  ephemeral?: boolean;
}

export function v2MessageFlags(options: V2MessageFlagsOptions = {}): number {
  let flags: number = MessageFlags.IsComponentsV2;
  if (options.ephemeral) {
    flags = flags | MessageFlags.Ephemeral;
  }
  return flags;
}

/**
 * Escapes Discord markdown so user-entered text renders literally.
 */
export function sanitizeMarkdown(text: string): string {
  return text.replace(/([*_`~|>\\])/g, '\\$1');
}

export function truncate(text: string, maxLength: number): string {
  if (maxLength < 3) {
    throw new Error('maxLength must be at least 3');
  }
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength - 3) + '...';
}

export function createDivider(): SeparatorBuilder {
  return new SeparatorBuilder().setDivider(true);
}

export function createContainer(accentColor: number): ContainerBuilder {
  return new ContainerBuilder().setAccentColor(accentColor);
}
