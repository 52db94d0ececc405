import type { RowDataPacket } from 'mysql2';
import type { QueryRunner } from '../../../core/database/mysql.js';
import { Logger } from '../../../shared/utils/logger.js';
import type { DeleteResult, InsertResult, RegistrySnapshot, UserRecord } from '../types.js';
import type { RegistryStore } from './RegistryStore.js';

const logger = new Logger('Registry:Store');

interface UserRow extends RowDataPacket {
  id: string;
  username: string;
  password: string;
}

// bigNumberStrings already returns BIGINT as text; the cast keeps that true
// for pools configured without it.
const SELECT_USERS = 'SELECT CAST(id AS CHAR) AS id, username, password FROM registry_users';

function toRecord(row: UserRow): UserRecord {
  return { id: String(row.id), username: row.username, password: row.password };
}

export class MySqlRegistryStore implements RegistryStore {
  constructor(private db: QueryRunner) {}

  async insert(record: UserRecord): Promise<InsertResult> {
    const existing = await this.findByUsername(record.username);
    if (existing) {
      logger.debug(`Username ${record.username} already registered`);
      return { status: 'conflict' };
    }

    await this.db.execute(
      'INSERT INTO registry_users (id, username, password) VALUES (?, ?, ?)',
      [record.id, record.username, record.password]
    );
    logger.debug(`Inserted ${record.username} (${record.id})`);
    return { status: 'inserted' };
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const rows = await this.db.query<UserRow[]>(
      `${SELECT_USERS} WHERE username = ? ORDER BY seq LIMIT 1`,
      [username]
    );
    const row = rows[0];
    return row ? toRecord(row) : null;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const rows = await this.db.query<UserRow[]>(
      `${SELECT_USERS} WHERE id = ? ORDER BY seq LIMIT 1`,
      [id]
    );
    const row = rows[0];
    return row ? toRecord(row) : null;
  }

  async deleteById(id: string): Promise<DeleteResult> {
    const result = await this.db.execute('DELETE FROM registry_users WHERE id = ?', [id]);
    if (result.affectedRows === 0) {
      return { status: 'not-found' };
    }
    logger.debug(`Deleted ${result.affectedRows} record(s) for ${id}`);
    return { status: 'deleted', count: result.affectedRows };
  }

  async replaceAll(records: RegistrySnapshot): Promise<void> {
    await this.db.transaction(async (connection) => {
      // DELETE rather than TRUNCATE: TRUNCATE commits implicitly
      await connection.execute('DELETE FROM registry_users');
      if (records.length > 0) {
        await connection.query(
          'INSERT INTO registry_users (id, username, password) VALUES ?',
          [records.map(record => [record.id, record.username, record.password])]
        );
      }
    });
    logger.debug(`Replaced registry with ${records.length} record(s)`);
  }

  async all(): Promise<RegistrySnapshot> {
    const rows = await this.db.query<UserRow[]>(`${SELECT_USERS} ORDER BY seq`);
    return rows.map(toRecord);
  }
}
