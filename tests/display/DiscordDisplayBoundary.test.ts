import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { ComponentType, MessageFlags, type Client } from 'discord.js';
import {
  DiscordDisplayBoundary,
  buildQueueContainer,
  classifyPublishError,
  pageButtonId,
  parsePageButtonId,
} from '../../src/display/DiscordDisplayBoundary.js';
import type { SurfaceTarget } from '../../src/display/types.js';
import type { RenderedQueuePage } from '../../src/lib/queue-renderer.js';
import { Tier } from '../../src/lib/tiers.js';

jest.mock('../../src/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function discordError(message: string, fields: Record<string, number>): Error {
  return Object.assign(new Error(message), fields);
}

const page: RenderedQueuePage = {
  tier: Tier.T3,
  title: '3 Skip Queue',
  lines: ['1. **A - B** by C `#000001`'],
  page: 1,
  totalPages: 2,
  totalItems: 11,
};

describe('DiscordDisplayBoundary', () => {
  describe('page button ids', () => {
    it('round-trips surface key and direction', () => {
      expect(pageButtonId('guild-1:t3', 'next')).toBe('queue:page:next:guild-1:t3');
      expect(parsePageButtonId('queue:page:next:guild-1:t3')).toEqual({
        surfaceKey: 'guild-1:t3',
        direction: 'next',
      });
      expect(parsePageButtonId(pageButtonId('s1', 'prev'))).toEqual({ surfaceKey: 's1', direction: 'prev' });
    });

    it('ignores other custom ids', () => {
      expect(parsePageButtonId('queue:page:current:s1')).toBeNull();
      expect(parsePageButtonId('request_reply:1')).toBeNull();
    });
  });

  describe('classifyPublishError', () => {
    it('treats unknown channel and unknown message as gone', () => {
      expect(classifyPublishError(discordError('Unknown Channel', { code: 10003 }))).toEqual({
        status: 'target_gone',
      });
      expect(classifyPublishError(discordError('Unknown Message', { code: 10008 }))).toEqual({
        status: 'target_gone',
      });
    });

    it('passes retry-after through for rate limits', () => {
      expect(classifyPublishError(discordError('Too Many Requests', { status: 429, retryAfter: 1500 }))).toEqual({
        status: 'rate_limited',
        retryAfterMs: 1500,
      });
      expect(classifyPublishError(discordError('Too Many Requests', { status: 429 }))).toEqual({
        status: 'rate_limited',
      });
    });

    it('treats missing access and everything else as transient', () => {
      expect(classifyPublishError(discordError('Missing Access', { code: 50001 }))).toEqual({
        status: 'transient',
        reason: 'missing access (50001)',
      });
      expect(classifyPublishError(new Error('socket hang up'))).toEqual({
        status: 'transient',
        reason: 'socket hang up',
      });
    });
  });

  describe('buildQueueContainer', () => {
    it('renders title, count, body and pagination', () => {
      const json = buildQueueContainer('s1', page).toJSON();

      expect(json.accent_color).toBe(0xfee75c);
      expect(json.components).toHaveLength(6);
      expect(json.components[0]).toMatchObject({ type: ComponentType.TextDisplay, content: '## 3 Skip Queue' });
      expect(json.components[1]).toMatchObject({ type: ComponentType.TextDisplay, content: '11 in queue' });
      expect(json.components[3]).toMatchObject({
        type: ComponentType.TextDisplay,
        content: '1. **A - B** by C `#000001`',
      });
      expect(json.components[5]).toMatchObject({
        type: ComponentType.ActionRow,
        components: [
          { custom_id: 'queue:page:prev:s1', disabled: true },
          { custom_id: 'queue:page:current:s1', label: '1/2', disabled: true },
          { custom_id: 'queue:page:next:s1', disabled: false },
        ],
      });
    });
  });

  describe('publish and verify', () => {
    const message = {
      id: 'msg-1',
      components: [{ type: ComponentType.Container }],
      edit: jest.fn<(options: unknown) => Promise<unknown>>(),
    };
    const channel = {
      isTextBased: () => true,
      isDMBased: () => false,
      messages: { fetch: jest.fn<(id: string) => Promise<typeof message>>() },
      send: jest.fn<(options: unknown) => Promise<{ id: string }>>(),
    };
    const fetchChannel = jest.fn<(id: string) => Promise<typeof channel | null>>();
    const client = { channels: { fetch: fetchChannel } } as unknown as Client;
    const target: SurfaceTarget = { surfaceKey: 's1', tier: Tier.T3, channelRef: 'chan-1', messageRef: null };

    let boundary: DiscordDisplayBoundary;

    beforeEach(() => {
      fetchChannel.mockResolvedValue(channel);
      channel.messages.fetch.mockResolvedValue(message);
      channel.send.mockResolvedValue({ id: 'msg-new' });
      message.edit.mockResolvedValue(message);
      message.components = [{ type: ComponentType.Container }];
      boundary = new DiscordDisplayBoundary(client);
    });

    it('sends a new v2 message when the surface has none', async () => {
      const outcome = await boundary.publish(target, page);

      expect(outcome).toEqual({ status: 'ok', messageRef: 'msg-new' });
      expect(channel.send).toHaveBeenCalledWith(
        expect.objectContaining({ flags: MessageFlags.IsComponentsV2 })
      );
      expect(message.edit).not.toHaveBeenCalled();
    });

    it('edits the bound message in place', async () => {
      const outcome = await boundary.publish({ ...target, messageRef: 'msg-1' }, page);

      expect(outcome).toEqual({ status: 'ok', messageRef: 'msg-1' });
      expect(channel.messages.fetch).toHaveBeenCalledWith('msg-1');
      expect(message.edit).toHaveBeenCalledTimes(1);
      expect(channel.send).not.toHaveBeenCalled();
    });

    it('reports a missing channel as gone', async () => {
      fetchChannel.mockResolvedValue(null);

      await expect(boundary.publish(target, page)).resolves.toEqual({ status: 'target_gone' });
    });

    it('reports a deleted message as gone', async () => {
      channel.messages.fetch.mockRejectedValue(discordError('Unknown Message', { code: 10008 }));

      await expect(boundary.publish({ ...target, messageRef: 'msg-1' }, page)).resolves.toEqual({
        status: 'target_gone',
      });
      await expect(boundary.verify({ ...target, messageRef: 'msg-1' })).resolves.toEqual({ status: 'gone' });
    });

    it('flags messages whose controls were stripped', async () => {
      message.components = [];

      await expect(boundary.verify({ ...target, messageRef: 'msg-1' })).resolves.toEqual({
        status: 'controls_missing',
      });
    });

    it('defers on transport errors during verification', async () => {
      channel.messages.fetch.mockRejectedValue(new Error('ETIMEDOUT'));

      await expect(boundary.verify({ ...target, messageRef: 'msg-1' })).resolves.toEqual({
        status: 'transient',
        reason: 'ETIMEDOUT',
      });
    });
  });
});
