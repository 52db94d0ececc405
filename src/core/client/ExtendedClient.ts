import {
  Client,
  ClientOptions,
  GatewayIntentBits,
  Partials,
  Events,
} from 'discord.js';
import { db, testMySQLConnection, closeMySQLPool } from '../database/mysql.js';
import { ModuleManager } from '../modules/ModuleManager.js';
import { CommandManager } from '../commands/CommandManager.js';
import { EventManager } from '../events/EventManager.js';
import { env, isDevelopment } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';
import type { BotModule } from '../../types/module.types.js';
import registryModule from '../../modules/registry/index.js';

const logger = new Logger('Client');

/**
 * Modules shipped with the bot
 */
const BUILTIN_MODULES: BotModule[] = [registryModule];

/**
 * Default client options. Attachments on guild messages need the
 * MessageContent intent; DM channels arrive as partials.
 */
const DEFAULT_CLIENT_OPTIONS: ClientOptions = {
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.DirectMessages,
  ],
  partials: [
    Partials.Channel,
    Partials.Message,
  ],
};

/**
 * Extended Discord.js Client with integrated managers.
 */
export class ExtendedClient extends Client {
  public readonly modules: ModuleManager;
  public readonly commands: CommandManager;
  public readonly events: EventManager;

  constructor(options?: Partial<ClientOptions>) {
    super({ ...DEFAULT_CLIENT_OPTIONS, ...options });

    this.modules = new ModuleManager({
      client: this,
      db,
      modules: BUILTIN_MODULES,
    });
    this.commands = new CommandManager();
    this.events = new EventManager(this);

    this.wireManagers();
    this.setupCoreEvents();
  }

  private wireManagers(): void {
    this.modules.setCommandsChangedCallback((module, action) => {
      if (action === 'register') {
        this.commands.registerModuleCommands(module);
      } else {
        this.commands.unregisterModuleCommands(module.metadata.id);
      }
    });

    this.modules.setEventsChangedCallback((module, action) => {
      if (action === 'register') {
        this.events.registerModuleEvents(module);
      } else {
        this.events.unregisterModuleEvents(module.metadata.id);
      }
    });
  }

  private setupCoreEvents(): void {
    this.once(Events.ClientReady, async (readyClient) => {
      logger.info(`Logged in as ${readyClient.user.tag}`);
      logger.info(`Serving ${readyClient.guilds.cache.size} guild(s)`);

      try {
        await this.commands.deployCommands();
      } catch (error) {
        logger.error('Failed to deploy commands:', error);
      }
    });

    this.on(Events.InteractionCreate, async (interaction) => {
      try {
        await this.commands.handleInteraction(interaction);
      } catch (error) {
        // Replying with the error embed itself failed (expired token, deleted channel)
        logger.error('Failed to handle interaction:', error);
      }
    });

    this.on(Events.Error, (error) => {
      logger.error('Client error:', error);
    });

    this.on(Events.Warn, (message) => {
      logger.warn('Client warning:', message);
    });

    if (isDevelopment) {
      this.on(Events.Debug, (message) => {
        if (message.includes('Heartbeat')) return;
        logger.debug(message);
      });
    }
  }

  /**
   * Connect to the database and load modules
   */
  async initialize(): Promise<void> {
    logger.info('Initializing bot...');

    const mysqlConnected = await testMySQLConnection();
    if (!mysqlConnected) {
      throw new Error('Failed to connect to MySQL database');
    }
    logger.info('Database connected');

    await this.modules.initialize();

    logger.info('Bot initialized');
  }

  /**
   * Start the bot - initialize then log in to Discord
   */
  async start(): Promise<void> {
    logger.info('Starting bot...');
    await this.initialize();
    await this.login(env.BOT_TOKEN);
  }

  /**
   * Shutdown the bot gracefully
   */
  async shutdown(): Promise<void> {
    logger.info('Shutting down bot...');

    await this.modules.shutdown();
    await closeMySQLPool();
    await this.destroy();

    logger.info('Bot shut down');
  }
}
