import { TextDisplayBuilder, type Client } from 'discord.js';
import { logger } from '../logger.js';
import { SettingKey, type SettingsCache } from '../lib/settings-cache.js';
import type { SessionSummary, SessionSummarySink } from '../services/ScoreEngine.js';
import {
  V2_ICONS,
  V2_LIMITS,
  createContainer,
  createDivider,
  sanitizeMarkdown,
  truncate,
  v2MessageFlags,
} from '../utils/v2-components.js';

const SUMMARY_COLOR = 0x5865f2;
const MAX_PARTICIPANT_LINES = 25;

function formatDuration(startedAt: Date, endedAt: Date): string {
  const minutes = Math.max(0, Math.round((endedAt.getTime() - startedAt.getTime()) / 60_000));
  const hours = Math.floor(minutes / 60);
  return hours > 0 ? `${hours}h ${minutes % 60}m` : `${minutes}m`;
}

export function formatSessionSummary(summary: SessionSummary): [string, string] {
  const counts = summary.eventCounts;
  const header = [
    `**Host:** ${sanitizeMarkdown(summary.hostIdentity)} (${formatDuration(summary.startedAt, summary.endedAt)})`,
    `${V2_ICONS.COINS} **${summary.totalCoins}** coins, **${summary.totalPoints}** points`,
    `Likes ${counts.like} | Comments ${counts.comment} | Shares ${counts.share} | Follows ${counts.follow} | Gifts ${counts.gift} | Joins ${counts.join}`,
  ];

  const rows = summary.participants.slice(0, MAX_PARTICIPANT_LINES).map((row, index) => {
    const crown = index === 0 && row.coins > 0 ? `${V2_ICONS.CROWN} ` : '';
    return `${index + 1}. ${crown}@${sanitizeMarkdown(row.handle)} - ${row.coins} coins, ${row.points} pts, ${row.watchMinutes} min`;
  });
  const hidden = summary.participants.length - rows.length;
  if (hidden > 0) {
    rows.push(`...and ${hidden} more`);
  }

  return [header.join('\n'), rows.length > 0 ? rows.join('\n') : 'No participants recorded.'];
}

/**
 * Posts session summaries to the channel stored under
 * `session_summary_channel_id`. Does nothing when the setting is absent.
 */
export class DiscordSessionSummarySink implements SessionSummarySink {
  constructor(
    private readonly client: Client,
    private readonly settings: SettingsCache
  ) {}

  async deliver(summary: SessionSummary): Promise<void> {
    const channelId = await this.settings.get(SettingKey.SESSION_SUMMARY_CHANNEL_ID);
    if (!channelId) {
      logger.info('No summary channel configured, skipping session summary', {
        sessionId: summary.sessionId,
      });
      return;
    }

    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || channel.isDMBased()) {
      logger.warn('Session summary channel is not a guild text channel', { channelId });
      return;
    }

    const [header, rows] = formatSessionSummary(summary);
    const container = createContainer(SUMMARY_COLOR)
      .addTextDisplayComponents(
        new TextDisplayBuilder().setContent('## Live Session Summary'),
        new TextDisplayBuilder().setContent(header)
      )
      .addSeparatorComponents(createDivider())
      .addTextDisplayComponents(
        new TextDisplayBuilder().setContent(truncate(rows, V2_LIMITS.MAX_TEXT_DISPLAY_LENGTH))
      );

    await channel.send({ components: [container], flags: v2MessageFlags() });
    logger.info('Session summary posted', { sessionId: summary.sessionId, channelId });
  }
}
