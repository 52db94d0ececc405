import { describe, it, expect, beforeEach, vi } from 'vitest';
import { readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import { MigrationRunner, splitStatements } from '../MigrationRunner.js';

const REGISTRY_MIGRATIONS = fileURLToPath(
  new URL('../../../modules/registry/migrations', import.meta.url)
);
const FIRST_MIGRATION = '001_create_registry_users.sql';

describe('splitStatements', () => {
  it('splits on semicolons and drops line comments', () => {
    const sql = "CREATE TABLE a (x INT);\n-- comment; here\nINSERT INTO a VALUES ('x;y');";
    expect(splitStatements(sql)).toEqual([
      'CREATE TABLE a (x INT)',
      "INSERT INTO a VALUES ('x;y')",
    ]);
  });

  it('keeps doubled quotes inside a string', () => {
    expect(splitStatements("SELECT 'it''s; fine';")).toEqual(["SELECT 'it''s; fine'"]);
  });

  it('drops block comments', () => {
    expect(splitStatements('/* a; b */ SELECT 1;')).toEqual(['SELECT 1']);
  });

  it('keeps a final statement without a semicolon', () => {
    expect(splitStatements('SELECT 1;\nSELECT 2')).toEqual(['SELECT 1', 'SELECT 2']);
  });

  it('returns nothing for comments only', () => {
    expect(splitStatements('-- nothing here\n')).toEqual([]);
  });
});

describe('MigrationRunner', () => {
  const connection = {
    query: vi.fn(),
    execute: vi.fn(),
  };
  const db = {
    query: vi.fn(),
    execute: vi.fn(),
    transaction: vi.fn(),
  };

  beforeEach(() => {
    vi.resetAllMocks();
    db.query.mockResolvedValue([]);
    db.execute.mockResolvedValue({ affectedRows: 0 });
    db.transaction.mockImplementation(async (callback) => callback(connection));
  });

  it('runs pending files and records them', async () => {
    const runner = new MigrationRunner(db);

    expect(await runner.runMigrations('registry', REGISTRY_MIGRATIONS)).toBe(1);

    expect(db.execute).toHaveBeenCalledWith(
      expect.stringContaining('CREATE TABLE IF NOT EXISTS module_migrations')
    );
    expect(connection.query).toHaveBeenCalledTimes(1);
    expect(connection.query).toHaveBeenCalledWith(
      expect.stringMatching(/^CREATE TABLE IF NOT EXISTS registry_users/)
    );
    expect(connection.execute).toHaveBeenCalledWith(
      'INSERT INTO module_migrations (module_id, filename, checksum) VALUES (?, ?, ?)',
      ['registry', FIRST_MIGRATION, expect.stringMatching(/^[0-9a-f]{32}$/)]
    );
  });

  it('skips files already executed', async () => {
    const content = await readFile(`${REGISTRY_MIGRATIONS}/${FIRST_MIGRATION}`, 'utf-8');
    const checksum = createHash('md5').update(content).digest('hex');
    db.query.mockResolvedValueOnce([{ filename: FIRST_MIGRATION, checksum }]);

    const runner = new MigrationRunner(db);

    expect(await runner.runMigrations('registry', REGISTRY_MIGRATIONS)).toBe(0);
    expect(db.transaction).not.toHaveBeenCalled();
  });

  it('treats a missing folder as no migrations', async () => {
    const runner = new MigrationRunner(db);

    expect(await runner.runMigrations('registry', `${REGISTRY_MIGRATIONS}/missing`)).toBe(0);
    expect(db.execute).not.toHaveBeenCalled();
  });

  it('propagates a failing statement', async () => {
    connection.query.mockRejectedValueOnce(new Error('syntax error'));
    const runner = new MigrationRunner(db);

    await expect(runner.runMigrations('registry', REGISTRY_MIGRATIONS)).rejects.toThrow('syntax error');
    expect(connection.execute).not.toHaveBeenCalled();
  });
});
