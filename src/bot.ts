import { ActivityType, Client, Events, GatewayIntentBits, type Interaction } from 'discord.js';
import type { Server } from 'http';
import type { Pool } from 'pg';
import { config } from './config.js';
import { logger } from './logger.js';
import { createPool } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { QueueEvents } from './lib/queue-events.js';
import { SettingsCache } from './lib/settings-cache.js';
import { SubmissionStore } from './services/SubmissionStore.js';
import { EngagementIdentityStore } from './services/EngagementIdentityStore.js';
import { ViewPointerStore } from './services/ViewPointerStore.js';
import { PriorityResolver } from './services/PriorityResolver.js';
import { ScoreEngine } from './services/ScoreEngine.js';
import { RefreshCoordinator } from './services/RefreshCoordinator.js';
import { QueueService } from './services/QueueService.js';
import { DiscordDisplayBoundary } from './display/DiscordDisplayBoundary.js';
import { DiscordSessionSummarySink } from './display/DiscordSessionSummarySink.js';
import { LiveEventSubscriber } from './events/LiveEventSubscriber.js';
import {
  handlePageButtonInteraction,
  isPageButtonInteraction,
} from './handlers/page-button-handler.js';
import { startHealthServer } from './health-server.js';
import { closeRedisClient, getRedisClient } from './redis-client.js';
import { DistributedLock } from './utils/distributed-lock.js';
import { getErrorMessage, getErrorStack } from './utils/error-handlers.js';

export class Bot {
  private readonly client: Client;
  private readonly pool: Pool;
  private readonly settings: SettingsCache;
  private readonly identities: EngagementIdentityStore;
  private readonly scoreEngine: ScoreEngine;
  private readonly refreshCoordinator: RefreshCoordinator;
  private readonly queueService: QueueService;
  private readonly liveEvents: LiveEventSubscriber;
  private healthCheckServer?: Server;
  private isReady = false;

  constructor() {
    this.client = new Client({ intents: [GatewayIntentBits.Guilds] });
    this.pool = createPool(config.databaseUrl);

    const events = new QueueEvents();
    this.settings = new SettingsCache(this.pool);
    const store = new SubmissionStore(this.pool, events);
    this.identities = new EngagementIdentityStore(this.pool);

    const redisClient = getRedisClient();
    if (!redisClient) {
      logger.warn('Redis not available - take-next will run without distributed locking');
    }
    const resolver = new PriorityResolver(store, {
      lock: redisClient ? new DistributedLock(redisClient) : null,
    });

    this.scoreEngine = new ScoreEngine(store, this.identities, {
      resortIntervalMs: config.scoring.resortIntervalMs,
      summarySink: new DiscordSessionSummarySink(this.client, this.settings),
    });

    this.refreshCoordinator = new RefreshCoordinator(
      store,
      new ViewPointerStore(this.pool),
      new DiscordDisplayBoundary(this.client),
      events,
      config.refresh
    );

    this.queueService = new QueueService(store, resolver, this.identities, this.settings);
    this.liveEvents = new LiveEventSubscriber();

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, () => {
      this.onReady().catch((error: unknown) => {
        logger.error('Ready handler failed', { error: getErrorMessage(error) });
      });
    });
    this.client.on(Events.InteractionCreate, (interaction: Interaction) => {
      void this.onInteraction(interaction);
    });
    this.client.on(Events.Error, this.onError.bind(this));
  }

  private async onReady(): Promise<void> {
    if (!this.client.user) {
      throw new Error('Client user not available');
    }

    this.client.user.setPresence({
      activities: [{ name: 'the review queue', type: ActivityType.Watching }],
      status: 'online',
    });

    await this.refreshCoordinator.start();
    logger.info('Refresh coordinator initialized');

    await this.initializeLiveEvents();

    this.isReady = true;
    logger.info('Bot ready', {
      username: this.client.user.tag,
      guilds: this.client.guilds.cache.size,
    });
  }

  private async initializeLiveEvents(): Promise<void> {
    try {
      await this.liveEvents.connect();
      await this.liveEvents.subscribe(event => this.scoreEngine.handle(event));
      logger.info('Score engine subscribed to live events');
    } catch (error) {
      logger.error('Failed to initialize live event feed - JetStream is required', {
        error: getErrorMessage(error),
        stack: getErrorStack(error),
      });
      throw error;
    }
  }

  private async onInteraction(interaction: Interaction): Promise<void> {
    if (!interaction.isButton() || !isPageButtonInteraction(interaction.customId)) {
      return;
    }
    try {
      await handlePageButtonInteraction(interaction, this.refreshCoordinator);
    } catch (error) {
      logger.error('Page button failed', { error: getErrorMessage(error) });
    }
  }

  private onError(error: Error): void {
    logger.error('Client error', { error: error.message, stack: error.stack });
  }

  async start(): Promise<void> {
    try {
      logger.info('Starting bot initialization');

      await initializeSchema(this.pool);
      await this.settings.load();
      const abandoned = await this.identities.closeAbandonedSessions();
      if (abandoned > 0) {
        logger.warn('Closed live sessions left open by a previous run', { count: abandoned });
      }

      if (config.healthCheck.enabled) {
        this.healthCheckServer = startHealthServer(
          {
            isReady: () => this.isReady,
            liveSessionId: () => this.scoreEngine.getActiveSession()?.sessionId ?? null,
            refreshStats: () => this.refreshCoordinator.getStats(),
            checkDatabase: async () => {
              await this.pool.query('SELECT 1');
            },
          },
          config.healthCheck.port
        );
      }

      logger.info('Connecting to Discord Gateway');
      await this.client.login(config.discordToken);

      logger.info('Bot started successfully');
    } catch (error) {
      logger.error('Failed to start bot', {
        error: getErrorMessage(error),
        stack: getErrorStack(error),
      });
      throw error;
    }
  }

  async stop(): Promise<void> {
    logger.info('Stopping bot');
    this.isReady = false;

    try {
      await this.liveEvents.close();
      logger.info('Live event subscriber closed');
    } catch (error) {
      logger.warn('Live event subscriber cleanup failed', { error: getErrorMessage(error) });
    }

    try {
      await this.scoreEngine.endSession();
    } catch (error) {
      logger.warn('Failed to close live session during shutdown', { error: getErrorMessage(error) });
    }
    await this.scoreEngine.stop();
    await this.refreshCoordinator.stop();

    if (this.healthCheckServer) {
      this.healthCheckServer.close();
      logger.info('Health check server stopped');
    }

    closeRedisClient();

    try {
      await this.pool.end();
    } catch (error) {
      logger.warn('Database pool cleanup failed', { error: getErrorMessage(error) });
    }

    await this.client.destroy();
    logger.info('Bot stopped');
  }

  getClient(): Client {
    return this.client;
  }

  getQueueService(): QueueService {
    return this.queueService;
  }

  getRefreshCoordinator(): RefreshCoordinator {
    return this.refreshCoordinator;
  }

  isRunning(): boolean {
    return this.isReady;
  }
}
