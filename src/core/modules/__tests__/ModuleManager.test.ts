import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Client } from 'discord.js';
import { ModuleManager } from '../ModuleManager.js';
import { MigrationRunner } from '../../database/MigrationRunner.js';
import { DatabaseService } from '../../database/mysql.js';
import type { BotModule } from '../../../types/module.types.js';

function fakeModule(
  id: string,
  priority: number,
  log: string[],
  options: { dependencies?: string[]; migrationsPath?: string } = {}
): BotModule {
  return {
    metadata: {
      id,
      name: id,
      description: `${id} module`,
      version: '1.0.0',
      dependencies: options.dependencies ?? [],
      priority,
    },
    commands: [],
    events: [],
    migrationsPath: options.migrationsPath ?? null,
    async onLoad() {
      log.push(`load:${id}`);
    },
    async onUnload() {
      log.push(`unload:${id}`);
    },
  };
}

describe('ModuleManager', () => {
  const db = new DatabaseService();
  let client: Client;
  let runner: MigrationRunner;
  let log: string[];

  beforeEach(() => {
    client = new Client({ intents: [] });
    runner = new MigrationRunner(db);
    vi.spyOn(runner, 'runMigrations').mockResolvedValue(0);
    log = [];
  });

  it('loads modules highest priority first', async () => {
    const manager = new ModuleManager({
      client,
      db,
      migrationRunner: runner,
      modules: [fakeModule('low', 10, log), fakeModule('high', 90, log)],
    });

    await manager.initialize();

    expect(log).toEqual(['load:high', 'load:low']);
    expect(manager.getLoadedModuleIds()).toEqual(['high', 'low']);
  });

  it('skips a module whose dependency is not loaded', async () => {
    const manager = new ModuleManager({
      client,
      db,
      migrationRunner: runner,
      modules: [fakeModule('needs-missing', 50, log, { dependencies: ['missing'] })],
    });

    await manager.initialize();

    expect(manager.isLoaded('needs-missing')).toBe(false);
    expect(log).toEqual([]);
  });

  it('runs migrations before onLoad and reports the module', async () => {
    const changes: string[] = [];
    const manager = new ModuleManager({
      client,
      db,
      migrationRunner: runner,
      modules: [fakeModule('registry', 50, log, { migrationsPath: '/tmp/migrations' })],
    });
    manager.setCommandsChangedCallback((module, action) => changes.push(`commands:${action}:${module.metadata.id}`));
    manager.setEventsChangedCallback((module, action) => changes.push(`events:${action}:${module.metadata.id}`));

    await manager.initialize();

    expect(runner.runMigrations).toHaveBeenCalledWith('registry', '/tmp/migrations');
    expect(changes).toEqual(['commands:register:registry', 'events:register:registry']);
  });

  it('unloads in reverse order on shutdown', async () => {
    const manager = new ModuleManager({
      client,
      db,
      migrationRunner: runner,
      modules: [fakeModule('a', 90, log), fakeModule('b', 10, log)],
    });

    await manager.initialize();
    await manager.shutdown();

    expect(log).toEqual(['load:a', 'load:b', 'unload:b', 'unload:a']);
    expect(manager.getLoadedModuleIds()).toEqual([]);
  });
});
