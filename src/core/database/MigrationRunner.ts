import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { createHash } from 'crypto';
import type { RowDataPacket } from 'mysql2';
import type { QueryRunner } from './mysql.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('MigrationRunner');

interface MigrationFile {
  filename: string;
  content: string;
  checksum: string;
}

interface ExecutedMigrationRow extends RowDataPacket {
  filename: string;
  checksum: string;
}

const CREATE_TRACKING_TABLE = `
  CREATE TABLE IF NOT EXISTS module_migrations (
    module_id VARCHAR(64) NOT NULL,
    filename VARCHAR(255) NOT NULL,
    checksum CHAR(32) NOT NULL,
    executed_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (module_id, filename)
  )`;

/**
 * Runs SQL migrations for modules.
 * Each module can have a migrations/ folder with numbered SQL files
 * (001_, 002_, ...). Executed files are tracked in module_migrations.
 */
export class MigrationRunner {
  private trackingReady = false;

  constructor(private db: QueryRunner) {}

  /**
   * Run all pending migrations for a module
   * @returns Number of migrations run
   */
  async runMigrations(moduleId: string, migrationsPath: string): Promise<number> {
    const migrationFiles = await this.getMigrationFiles(migrationsPath);

    if (migrationFiles.length === 0) {
      logger.debug(`No migrations found for module: ${moduleId}`);
      return 0;
    }

    await this.ensureTrackingTable();

    const executed = await this.db.query<ExecutedMigrationRow[]>(
      'SELECT filename, checksum FROM module_migrations WHERE module_id = ?',
      [moduleId]
    );
    const executedMap = new Map(executed.map(row => [row.filename, row.checksum]));

    const pending = migrationFiles.filter(migration => {
      const existingChecksum = executedMap.get(migration.filename);
      if (existingChecksum && existingChecksum !== migration.checksum) {
        logger.warn(
          `Migration ${migration.filename} for module ${moduleId} has been modified since execution. ` +
          `Expected checksum: ${existingChecksum}, got: ${migration.checksum}`
        );
      }
      return existingChecksum === undefined;
    });

    if (pending.length === 0) {
      logger.debug(`All migrations up to date for module: ${moduleId}`);
      return 0;
    }

    logger.info(`Running ${pending.length} migration(s) for module: ${moduleId}`);

    // Stop at the first failure; later files may depend on it
    for (const migration of pending) {
      await this.executeMigration(moduleId, migration);
    }

    return pending.length;
  }

  private async ensureTrackingTable(): Promise<void> {
    if (this.trackingReady) return;
    await this.db.execute(CREATE_TRACKING_TABLE);
    this.trackingReady = true;
  }

  private async getMigrationFiles(migrationsPath: string): Promise<MigrationFile[]> {
    let files: string[];
    try {
      files = await readdir(migrationsPath);
    } catch (error) {
      // Directory doesn't exist - no migrations
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const sqlFiles = files
      .filter(f => f.endsWith('.sql'))
      .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));

    const migrationFiles: MigrationFile[] = [];
    for (const filename of sqlFiles) {
      const content = await readFile(join(migrationsPath, filename), 'utf-8');
      migrationFiles.push({
        filename,
        content,
        checksum: createHash('md5').update(content).digest('hex'),
      });
    }
    return migrationFiles;
  }

  private async executeMigration(moduleId: string, migration: MigrationFile): Promise<void> {
    logger.info(`Executing migration: ${migration.filename}`);

    const statements = splitStatements(migration.content);

    try {
      await this.db.transaction(async (connection) => {
        for (const statement of statements) {
          await connection.query(statement);
        }
        await connection.execute(
          'INSERT INTO module_migrations (module_id, filename, checksum) VALUES (?, ?, ?)',
          [moduleId, migration.filename, migration.checksum]
        );
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error(`Migration ${migration.filename} failed: ${errorMessage}`);
      throw error;
    }

    logger.info(`Migration ${migration.filename} completed successfully`);
  }
}

/**
 * Split SQL content into individual statements.
 * Semicolons inside quoted strings and comments do not end a statement.
 */
export function splitStatements(content: string): string[] {
  const statements: string[] = [];
  let current = '';
  let quote: string | null = null;
  let lineComment = false;
  let blockComment = false;

  for (let i = 0; i < content.length; i++) {
    const char = content.charAt(i);
    const next = content.charAt(i + 1);

    if (lineComment) {
      if (char === '\n') lineComment = false;
      continue;
    }

    if (blockComment) {
      if (char === '*' && next === '/') {
        blockComment = false;
        i++;
      }
      continue;
    }

    if (quote) {
      current += char;
      if (char === quote) {
        // Doubled quote is an escaped quote
        if (next === quote) {
          current += next;
          i++;
        } else {
          quote = null;
        }
      }
      continue;
    }

    if (char === '-' && next === '-') {
      lineComment = true;
      continue;
    }

    if (char === '/' && next === '*') {
      blockComment = true;
      i++;
      continue;
    }

    if (char === "'" || char === '"' || char === '`') {
      quote = char;
      current += char;
      continue;
    }

    if (char === ';') {
      if (current.trim()) statements.push(current.trim());
      current = '';
      continue;
    }

    current += char;
  }

  if (current.trim()) statements.push(current.trim());

  return statements;
}
