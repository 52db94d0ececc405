import type { Client, ClientEvents } from 'discord.js';
import type { BotModule } from '../../types/module.types.js';
import type { BoundEventListener } from '../../types/event.types.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('EventManager');

/**
 * Manages event listener registration and cleanup for modules.
 */
export class EventManager {
  /** Bound event listeners by module */
  private boundListeners: Map<string, BoundEventListener[]> = new Map();

  constructor(private client: Client) {}

  /**
   * Register events from a module
   */
  registerModuleEvents(module: BotModule): void {
    const moduleId = module.metadata.id;
    const listeners: BoundEventListener[] = [];

    for (const event of module.events) {
      event.moduleId = moduleId;

      const detach = event.attach(this.client, (eventName, run) =>
        this.runHandler(moduleId, eventName, run)
      );

      listeners.push({ moduleId, eventName: event.name, detach });
      logger.debug(`Registered event: ${event.name} (module: ${moduleId})`);
    }

    this.boundListeners.set(moduleId, listeners);
    logger.info(`Registered ${listeners.length} event(s) from module: ${moduleId}`);
  }

  /**
   * Unregister events from a module
   */
  unregisterModuleEvents(moduleId: string): void {
    const listeners = this.boundListeners.get(moduleId) ?? [];

    for (const bound of listeners) {
      bound.detach();
      logger.debug(`Unregistered event: ${bound.eventName} (module: ${moduleId})`);
    }

    this.boundListeners.delete(moduleId);
    logger.info(`Unregistered ${listeners.length} event(s) from module: ${moduleId}`);
  }

  /**
   * Handler failures are logged and go no further
   */
  private async runHandler(
    moduleId: string,
    eventName: keyof ClientEvents,
    run: () => Promise<void> | void
  ): Promise<void> {
    try {
      await run();
    } catch (error) {
      logger.error(`Error in event handler ${eventName} (module: ${moduleId}):`, error);
    }
  }

  getModuleEventCount(moduleId: string): number {
    return this.boundListeners.get(moduleId)?.length ?? 0;
  }
}
