import mysql, { Pool, PoolConnection, RowDataPacket, ResultSetHeader } from 'mysql2/promise';
import { parseDatabaseUrl, env } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';

const logger = new Logger('MySQL');

/**
 * MySQL connection pool shared by the core and the modules.
 */
class MySQLService {
  private static pool: Pool | null = null;

  /**
   * Get or create the connection pool
   */
  static getPool(): Pool {
    if (!MySQLService.pool) {
      const dbConfig = parseDatabaseUrl(env.DATABASE_URL);

      MySQLService.pool = mysql.createPool({
        host: dbConfig.host,
        port: dbConfig.port,
        user: dbConfig.user,
        password: dbConfig.password,
        database: dbConfig.database,
        waitForConnections: true,
        connectionLimit: 10,
        queueLimit: 0,
        enableKeepAlive: true,
        keepAliveInitialDelay: 0,
        // Discord snowflakes live in BIGINT columns
        supportBigNumbers: true,
        bigNumberStrings: true,
      });
    }
    return MySQLService.pool;
  }

  static async testConnection(): Promise<boolean> {
    try {
      const connection = await MySQLService.getPool().getConnection();
      await connection.ping();
      connection.release();
      return true;
    } catch (error) {
      logger.error('MySQL connection test failed:', error);
      return false;
    }
  }

  static async close(): Promise<void> {
    if (MySQLService.pool) {
      await MySQLService.pool.end();
      MySQLService.pool = null;
    }
  }
}

export const testMySQLConnection = MySQLService.testConnection;
export const closeMySQLPool = MySQLService.close;

/**
 * Thin query interface over the pool. Modules get one through their context.
 */
export class DatabaseService {
  private poolOverride: Pool | null;

  constructor(pool?: Pool) {
    this.poolOverride = pool ?? null;
  }

  /** The pool is created on first use so importing this file opens nothing */
  private get pool(): Pool {
    return this.poolOverride ?? MySQLService.getPool();
  }

  /**
   * Execute a query and return rows
   */
  async query<T extends RowDataPacket[]>(
    sql: string,
    params?: unknown[]
  ): Promise<T> {
    const [rows] = await this.pool.execute<T>(sql, params);
    return rows;
  }

  /**
   * Execute an insert/update/delete and return the result
   */
  async execute(
    sql: string,
    params?: unknown[]
  ): Promise<ResultSetHeader> {
    const [result] = await this.pool.execute<ResultSetHeader>(sql, params);
    return result;
  }

  /**
   * Execute multiple queries in a transaction
   */
  async transaction<T>(
    callback: (connection: PoolConnection) => Promise<T>
  ): Promise<T> {
    const connection = await this.pool.getConnection();

    try {
      await connection.beginTransaction();
      const result = await callback(connection);
      await connection.commit();
      return result;
    } catch (error) {
      await connection.rollback();
      throw error;
    } finally {
      connection.release();
    }
  }
}

/**
 * The part of DatabaseService that repositories use
 */
export type QueryRunner = Pick<DatabaseService, 'query' | 'execute' | 'transaction'>;

/**
 * Shared database service instance
 */
export const db = new DatabaseService();
