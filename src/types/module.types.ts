import type { Client } from 'discord.js';
import type { ModuleCommand } from './command.types.js';
import type { ModuleEvent } from './event.types.js';
import type { DatabaseService } from '../core/database/mysql.js';

/**
 * Module metadata describing the module
 */
export interface ModuleMetadata {
  /** Unique identifier for the module (e.g., "registry") */
  id: string;

  /** Display name for the module */
  name: string;

  description: string;

  /** Semantic version (e.g., "1.0.0") */
  version: string;

  /** Module IDs that must be loaded first */
  dependencies: string[];

  /** Priority for loading order (higher = earlier, default = 50) */
  priority: number;
}

/**
 * Context passed to modules when they load
 */
export interface ModuleContext {
  /** Discord.js client */
  client: Client;

  /** Database service for the module's tables */
  db: DatabaseService;

  /**
   * Check if another module is loaded
   */
  isModuleLoaded(moduleId: string): boolean;
}

/**
 * Main module interface that all modules must implement
 */
export interface BotModule {
  readonly metadata: ModuleMetadata;

  /** Slash commands provided by this module */
  readonly commands: ModuleCommand[];

  /** Client events listened to by this module */
  readonly events: ModuleEvent[];

  /**
   * Absolute path to the module's SQL migrations folder,
   * or null if the module has no tables
   */
  readonly migrationsPath: string | null;

  /**
   * Called after migrations ran. Build services here.
   */
  onLoad?(context: ModuleContext): Promise<void>;

  /**
   * Called on shutdown. Release resources here.
   */
  onUnload?(): Promise<void>;
}

/**
 * Abstract base class for modules.
 */
export abstract class BaseModule implements BotModule {
  abstract readonly metadata: ModuleMetadata;

  /** Module context - set during onLoad */
  protected context: ModuleContext | null = null;

  /** Shorthand access to client */
  protected get client(): Client {
    if (!this.context) {
      throw new Error('Module not loaded - context not available');
    }
    return this.context.client;
  }

  /** Shorthand access to database service */
  protected get db(): DatabaseService {
    if (!this.context) {
      throw new Error('Module not loaded - context not available');
    }
    return this.context.db;
  }

  commands: ModuleCommand[] = [];
  events: ModuleEvent[] = [];
  migrationsPath: string | null = null;

  async onLoad(context: ModuleContext): Promise<void> {
    this.context = context;
  }

  async onUnload(): Promise<void> {
    this.context = null;
  }
}

export type { ModuleCommand } from './command.types.js';
export type { ModuleEvent } from './event.types.js';
