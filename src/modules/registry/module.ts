import { fileURLToPath } from 'node:url';
import { BaseModule, ModuleMetadata, ModuleContext } from '../../types/module.types.js';
import { env } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';
import { command as registerCommand } from './commands/register.js';
import { command as signinCommand } from './commands/signin.js';
import { command as deleteCommand } from './commands/delete.js';
import { command as saveCommand } from './commands/save.js';
import { command as updateCommand } from './commands/update.js';
import { command as leaderboardCommand } from './commands/leaderboard.js';
import { command as rankCommand } from './commands/rank.js';
import { messageCreateEvent } from './events/messageCreate.js';
import { MySqlRegistryStore } from './services/MySqlRegistryStore.js';
import { DiscordSnapshotChannel, clientChannelLookup } from './services/DiscordSnapshotChannel.js';
import { SnapshotPointerState, pointerFromConfig } from './services/SnapshotPointer.js';
import { SyncManager } from './services/SyncManager.js';
import { RegistryService } from './services/RegistryService.js';
import { setRegistryService } from './state.js';

const logger = new Logger('Registry');

/**
 * Registry Module - player registration backed up to a Discord channel
 *
 * Provides:
 * - /register, /signin, /delete for players
 * - /save, /update to back the registry up as a message attachment
 * - /leaderboard, /rank ordered by Discord account age, newest first
 * - File references for uploaded backups
 */
export class RegistryModule extends BaseModule {
  readonly metadata: ModuleMetadata = {
    id: 'registry',
    name: 'Registry',
    description: 'Player registry with a leaderboard and channel backups',
    version: '1.0.0',
    dependencies: [],
    priority: 50,
  };

  constructor() {
    super();

    this.commands = [
      registerCommand,
      signinCommand,
      deleteCommand,
      saveCommand,
      updateCommand,
      leaderboardCommand,
      rankCommand,
    ];
    this.events = [messageCreateEvent];
    this.migrationsPath = fileURLToPath(new URL('./migrations', import.meta.url));
  }

  async onLoad(context: ModuleContext): Promise<void> {
    await super.onLoad(context);

    const pointer = pointerFromConfig(env);
    if (!pointer) {
      logger.warn('No backup location configured; the registry starts from the database alone');
    }

    const store = new MySqlRegistryStore(context.db);
    const channel = new DiscordSnapshotChannel(clientChannelLookup(context.client));
    const sync = new SyncManager(store, channel, new SnapshotPointerState(pointer));

    setRegistryService(new RegistryService(store, sync, {
      leaderboardSize: env.LEADERBOARD_SIZE,
    }));

    logger.info('Registry module loaded');
  }

  async onUnload(): Promise<void> {
    setRegistryService(null);
    await super.onUnload();
    logger.info('Registry module unloaded');
  }
}
