import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  TextDisplayBuilder,
  type Client,
  type ContainerBuilder,
  type GuildTextBasedChannel,
} from 'discord.js';
import { logger } from '../logger.js';
import type { RenderedQueuePage } from '../lib/queue-renderer.js';
import { getErrorMessage, hasNumericCode, hasStatus } from '../utils/error-handlers.js';
import {
  TIER_COLORS,
  V2_ICONS,
  V2_LIMITS,
  createContainer,
  createDivider,
  truncate,
  v2MessageFlags,
} from '../utils/v2-components.js';
import type { DisplayBoundary, PublishOutcome, SurfaceTarget, VerifyOutcome } from './types.js';

const UNKNOWN_CHANNEL = 10003;
const UNKNOWN_MESSAGE = 10008;
const MISSING_ACCESS = 50001;
const MISSING_PERMISSIONS = 50013;
const TOO_MANY_REQUESTS = 429;

const PAGE_BUTTON_PREFIX = 'queue:page';

export type PageDirection = 'prev' | 'next';

export function pageButtonId(surfaceKey: string, direction: PageDirection): string {
  return `${PAGE_BUTTON_PREFIX}:${direction}:${surfaceKey}`;
}

export function parsePageButtonId(customId: string): { surfaceKey: string; direction: PageDirection } | null {
  const match = /^queue:page:(prev|next):(.+)$/.exec(customId);
  if (!match) {
    return null;
  }
  const direction = match[1] === 'prev' ? 'prev' : 'next';
  return { surfaceKey: match[2], direction };
}

function hasRetryAfter(error: unknown): error is { retryAfter: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'retryAfter' in error &&
    typeof error.retryAfter === 'number'
  );
}

/**
 * Maps a discord.js failure onto a publish outcome. Unknown channel or
 * message means the target is gone; missing access is treated as
 * recoverable.
 */
export function classifyPublishError(error: unknown): PublishOutcome {
  if (hasNumericCode(error) && (error.code === UNKNOWN_CHANNEL || error.code === UNKNOWN_MESSAGE)) {
    return { status: 'target_gone' };
  }
  if (hasStatus(error) && error.status === TOO_MANY_REQUESTS) {
    return hasRetryAfter(error)
      ? { status: 'rate_limited', retryAfterMs: error.retryAfter }
      : { status: 'rate_limited' };
  }
  if (hasNumericCode(error) && (error.code === MISSING_ACCESS || error.code === MISSING_PERMISSIONS)) {
    return { status: 'transient', reason: `missing access (${error.code})` };
  }
  return { status: 'transient', reason: getErrorMessage(error) };
}

export function buildQueueContainer(surfaceKey: string, page: RenderedQueuePage): ContainerBuilder {
  const body = truncate(page.lines.join('\n'), V2_LIMITS.MAX_TEXT_DISPLAY_LENGTH);
  const container = createContainer(TIER_COLORS[page.tier])
    .addTextDisplayComponents(
      new TextDisplayBuilder().setContent(`## ${page.title}`),
      new TextDisplayBuilder().setContent(`${page.totalItems} in queue`)
    )
    .addSeparatorComponents(createDivider())
    .addTextDisplayComponents(new TextDisplayBuilder().setContent(body));

  container.addSeparatorComponents(createDivider());
  container.addActionRowComponents(createPaginationRow(surfaceKey, page));
  return container;
}

function createPaginationRow(surfaceKey: string, page: RenderedQueuePage): ActionRowBuilder<ButtonBuilder> {
  const previousButton = new ButtonBuilder()
    .setCustomId(pageButtonId(surfaceKey, 'prev'))
    .setLabel(V2_ICONS.NAV_PREVIOUS)
    .setStyle(ButtonStyle.Secondary)
    .setDisabled(page.page <= 1);

  const pageIndicator = new ButtonBuilder()
    .setCustomId(`${PAGE_BUTTON_PREFIX}:current:${surfaceKey}`)
    .setLabel(`${page.page}/${page.totalPages}`)
    .setStyle(ButtonStyle.Secondary)
    .setDisabled(true);

  const nextButton = new ButtonBuilder()
    .setCustomId(pageButtonId(surfaceKey, 'next'))
    .setLabel(V2_ICONS.NAV_NEXT)
    .setStyle(ButtonStyle.Secondary)
    .setDisabled(page.page >= page.totalPages);

  return new ActionRowBuilder<ButtonBuilder>().addComponents(previousButton, pageIndicator, nextButton);
}

/**
 * Publishes queue pages as Components v2 messages. A surface keeps one
 * message that is edited in place; it is only sent fresh when there is
 * no message yet.
 */
export class DiscordDisplayBoundary implements DisplayBoundary {
  constructor(private readonly client: Client) {}

  async publish(target: SurfaceTarget, page: RenderedQueuePage): Promise<PublishOutcome> {
    try {
      const channel = await this.resolveChannel(target.channelRef);
      if (!channel) {
        return { status: 'target_gone' };
      }

      const container = buildQueueContainer(target.surfaceKey, page);
      if (target.messageRef) {
        const message = await channel.messages.fetch(target.messageRef);
        await message.edit({ components: [container] });
        return { status: 'ok', messageRef: message.id };
      }

      const sent = await channel.send({ components: [container], flags: v2MessageFlags() });
      return { status: 'ok', messageRef: sent.id };
    } catch (error) {
      const outcome = classifyPublishError(error);
      logger.debug('Queue publish failed', {
        surfaceKey: target.surfaceKey,
        outcome: outcome.status,
        error: getErrorMessage(error),
      });
      return outcome;
    }
  }

  async verify(target: SurfaceTarget & { messageRef: string }): Promise<VerifyOutcome> {
    try {
      const channel = await this.resolveChannel(target.channelRef);
      if (!channel) {
        return { status: 'gone' };
      }
      const message = await channel.messages.fetch(target.messageRef);
      if (message.components.length === 0) {
        return { status: 'controls_missing' };
      }
      return { status: 'ok' };
    } catch (error) {
      const outcome = classifyPublishError(error);
      if (outcome.status === 'target_gone') {
        return { status: 'gone' };
      }
      return { status: 'transient', reason: getErrorMessage(error) };
    }
  }

  private async resolveChannel(channelRef: string): Promise<GuildTextBasedChannel | null> {
    const channel = await this.client.channels.fetch(channelRef);
    if (!channel || !channel.isTextBased() || channel.isDMBased()) {
      return null;
    }
    return channel;
  }
}
