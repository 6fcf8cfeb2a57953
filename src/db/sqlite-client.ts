/**
 * SQLite Database Client
 *
 * Owns the better-sqlite3 connection and translates unique-constraint
 * failures into ConstraintViolationError so stores can fall back to a find.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

import { ConstraintViolationError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/console-logger.js';
import { getSchemaStats, initializeSchema } from './sqlite-schema.js';

export const IN_MEMORY_DATABASE = ':memory:';

const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

/**
 * True when `error` is SQLite rejecting a duplicate key.
 */
export function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && UNIQUE_VIOLATION_CODES.has(error.code);
}

export interface SqliteClientOptions {
  logger?: Logger;
}

/**
 * SQLite client for Node.js
 */
export class SqliteClient {
  private db: Database.Database | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly dbPath: string,
    options: SqliteClientOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger('SqliteClient');
  }

  /**
   * Open the database and create the schema
   */
  initialize(): void {
    if (this.db) {
      return;
    }

    if (this.dbPath !== IN_MEMORY_DATABASE) {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    const db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY_DATABASE) {
      db.pragma('journal_mode = WAL');
    }
    initializeSchema(db);
    this.db = db;
    this.logger.debug('Database ready', { path: this.dbPath });
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  isConnected(): boolean {
    return this.db !== null;
  }

  /**
   * Underlying connection (throws if not initialized)
   */
  get connection(): Database.Database {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Run a write, converting duplicate-key failures on `table` into
   * ConstraintViolationError. Other errors propagate unchanged.
   */
  write<T>(table: string, operation: (db: Database.Database) => T): T {
    try {
      return operation(this.connection);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConstraintViolationError(
          `Duplicate key in ${table}`,
          table,
          error instanceof Error ? error : undefined
        );
      }
      throw error;
    }
  }

  /**
   * Run `operation` inside one transaction
   */
  transaction<T>(operation: (db: Database.Database) => T): T {
    const db = this.connection;
    return db.transaction(() => operation(db))();
  }

  stats(): Record<string, number> {
    return getSchemaStats(this.connection);
  }
}

/**
 * Open an initialized client; ":memory:" gives a private ephemeral database.
 */
export function openDatabase(dbPath: string = IN_MEMORY_DATABASE, options: SqliteClientOptions = {}): SqliteClient {
  const client = new SqliteClient(dbPath, options);
  client.initialize();
  return client;
}
