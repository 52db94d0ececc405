import type { Client, ClientEvents } from 'discord.js';

/**
 * Event handler function type
 */
export type EventHandler<K extends keyof ClientEvents> = (
  ...args: ClientEvents[K]
) => Promise<void> | void;

/**
 * Runs a handler invocation on behalf of the EventManager, which owns
 * error handling. Never rejects.
 */
export type ListenerRunner = (
  eventName: keyof ClientEvents,
  run: () => Promise<void> | void
) => Promise<void>;

/**
 * Module event listener. The handler's argument types stay inside the
 * definition; the manager only attaches and detaches it.
 */
export interface ModuleEvent {
  /** Event name from Discord.js ClientEvents */
  name: keyof ClientEvents;

  /** Whether to listen only once */
  once: boolean;

  /** Module this event belongs to (set automatically) */
  moduleId?: string;

  /**
   * Register on the client; returns the function that removes it again
   */
  attach(client: Client, runner: ListenerRunner): () => void;
}

/**
 * Define an event listener with type-safe handler arguments
 */
export function defineEvent<K extends keyof ClientEvents>(
  name: K,
  execute: EventHandler<K>,
  options?: { once?: boolean }
): ModuleEvent {
  const once = options?.once ?? false;

  return {
    name,
    once,
    attach(client, runner) {
      const listener = (...args: ClientEvents[K]): void => {
        void runner(name, () => execute(...args));
      };

      if (once) {
        client.once(name, listener);
      } else {
        client.on(name, listener);
      }

      return () => {
        client.off(name, listener);
      };
    },
  };
}

/**
 * Wrapper for bound event listeners (used for cleanup)
 */
export interface BoundEventListener {
  moduleId: string;
  eventName: keyof ClientEvents;
  detach: () => void;
}
