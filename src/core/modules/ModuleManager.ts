import type { Client } from 'discord.js';
import type { BotModule, ModuleContext, ModuleMetadata } from '../../types/module.types.js';
import { MigrationRunner } from '../database/MigrationRunner.js';
import type { DatabaseService } from '../database/mysql.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('ModuleManager');

interface LoadedModule {
  instance: BotModule;
  metadata: ModuleMetadata;
  loadedAt: Date;
}

export type ModuleChangeCallback = (module: BotModule, action: 'register' | 'unregister') => void;

/**
 * Options for module manager initialization
 */
export interface ModuleManagerOptions {
  client: Client;
  db: DatabaseService;
  modules: BotModule[];
  migrationRunner?: MigrationRunner;
}

/**
 * Loads the bot's modules in priority order: runs their migrations,
 * hands them a context, and tells the command/event managers about them.
 */
export class ModuleManager {
  private client: Client;
  private db: DatabaseService;
  private available: BotModule[];
  private migrationRunner: MigrationRunner;

  /** Currently loaded modules */
  private loadedModules: Map<string, LoadedModule> = new Map();

  private onCommandsChanged?: ModuleChangeCallback;
  private onEventsChanged?: ModuleChangeCallback;

  constructor(options: ModuleManagerOptions) {
    this.client = options.client;
    this.db = options.db;
    this.available = options.modules;
    this.migrationRunner = options.migrationRunner ?? new MigrationRunner(options.db);
  }

  setCommandsChangedCallback(callback: ModuleChangeCallback): void {
    this.onCommandsChanged = callback;
  }

  setEventsChangedCallback(callback: ModuleChangeCallback): void {
    this.onEventsChanged = callback;
  }

  /**
   * Load every module, highest priority first.
   * A module whose dependencies are not loaded is skipped.
   */
  async initialize(): Promise<void> {
    logger.info('Initializing module system...');

    const ordered = [...this.available].sort((a, b) => b.metadata.priority - a.metadata.priority);

    for (const module of ordered) {
      const missing = module.metadata.dependencies.filter(dep => !this.loadedModules.has(dep));
      if (missing.length > 0) {
        logger.error(`Cannot load ${module.metadata.id}: missing dependencies: ${missing.join(', ')}`);
        continue;
      }
      await this.loadModule(module);
    }

    logger.info(`Module system initialized. ${this.loadedModules.size} module(s) loaded.`);
  }

  /**
   * Load a single module. Migration or onLoad failures propagate; the bot
   * does not start half-configured.
   */
  async loadModule(module: BotModule): Promise<void> {
    const moduleId = module.metadata.id;

    if (this.loadedModules.has(moduleId)) {
      logger.warn(`Module ${moduleId} is already loaded`);
      return;
    }

    if (module.migrationsPath) {
      const migrationsRun = await this.migrationRunner.runMigrations(moduleId, module.migrationsPath);
      if (migrationsRun > 0) {
        logger.info(`Ran ${migrationsRun} migration(s) for module ${moduleId}`);
      }
    }

    const context: ModuleContext = {
      client: this.client,
      db: this.db,
      isModuleLoaded: (depModuleId: string) => this.isLoaded(depModuleId),
    };

    await module.onLoad?.(context);

    this.loadedModules.set(moduleId, {
      instance: module,
      metadata: module.metadata,
      loadedAt: new Date(),
    });

    this.onCommandsChanged?.(module, 'register');
    this.onEventsChanged?.(module, 'register');

    logger.info(`Module ${moduleId} v${module.metadata.version} loaded`);
  }

  async unloadModule(moduleId: string): Promise<boolean> {
    const loaded = this.loadedModules.get(moduleId);
    if (!loaded) {
      logger.warn(`Module ${moduleId} is not loaded`);
      return false;
    }

    this.onEventsChanged?.(loaded.instance, 'unregister');
    this.onCommandsChanged?.(loaded.instance, 'unregister');

    await loaded.instance.onUnload?.();
    this.loadedModules.delete(moduleId);

    logger.info(`Module ${moduleId} unloaded`);
    return true;
  }

  isLoaded(moduleId: string): boolean {
    return this.loadedModules.has(moduleId);
  }

  getLoadedModuleIds(): string[] {
    return Array.from(this.loadedModules.keys());
  }

  /**
   * Unload all modules, last loaded first
   */
  async shutdown(): Promise<void> {
    logger.info('Shutting down all modules...');

    const moduleIds = Array.from(this.loadedModules.keys()).reverse();
    for (const moduleId of moduleIds) {
      try {
        await this.unloadModule(moduleId);
      } catch (error) {
        logger.error(`Error unloading module ${moduleId}:`, error);
      }
    }

    logger.info('All modules shut down');
  }
}
