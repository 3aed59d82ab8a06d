import { MessageFlags, type ButtonInteraction } from 'discord.js';
import { logger } from '../logger.js';
import { generateErrorId, extractErrorDetails } from '../lib/errors.js';
import { parsePageButtonId } from '../display/DiscordDisplayBoundary.js';
import type { RefreshCoordinator } from '../services/RefreshCoordinator.js';

export function isPageButtonInteraction(customId: string): boolean {
  return parsePageButtonId(customId) !== null;
}

/**
 * Moves a queue view one page back or forward. The message itself is
 * rewritten by the next refresh tick, not here.
 */
export async function handlePageButtonInteraction(
  interaction: ButtonInteraction,
  coordinator: RefreshCoordinator
): Promise<void> {
  const parsed = parsePageButtonId(interaction.customId);
  if (!parsed) {
    return;
  }

  const errorId = generateErrorId();
  const pointer = coordinator.getPointer(parsed.surfaceKey);

  if (!pointer || !pointer.active) {
    await interaction.reply({
      content: 'This queue view is no longer active.',
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  try {
    await interaction.deferUpdate();
    const delta = parsed.direction === 'next' ? 1 : -1;
    const page = await coordinator.setPage(parsed.surfaceKey, pointer.currentPage + delta);

    logger.debug('Queue view page changed', {
      error_id: errorId,
      surface_key: parsed.surfaceKey,
      page,
      user_id: interaction.user.id,
    });
  } catch (error) {
    const errorDetails = extractErrorDetails(error);
    logger.error('Error handling queue page button', {
      error_id: errorId,
      surface_key: parsed.surfaceKey,
      error: errorDetails.message,
      error_type: errorDetails.type,
    });

    try {
      await interaction.followUp({
        content: `Could not change page. Error ID: \`${errorId}\``,
        flags: MessageFlags.Ephemeral,
      });
    } catch (followUpError) {
      logger.debug('Failed to send error response for page button', {
        error_id: errorId,
        error: extractErrorDetails(followUpError).message,
      });
    }
  }
}
