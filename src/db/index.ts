/**
 * Database connection and configuration using Drizzle ORM with better-sqlite3
 */

import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import fs from 'fs';
import path from 'path';
import * as schema from './schema.js';
import { runMigrations } from './migrations.js';
import { Settings } from '../config/settings.js';
import { createLogger } from '../utils/loggingConfig.js';

const logger = createLogger('database');

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Either the database itself or an open transaction; repositories accept both
 */
export type DbExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

export interface DatabaseConfig {
  path: string;
  enableForeignKeys: boolean;
  synchronous: 'OFF' | 'NORMAL' | 'FULL' | 'EXTRA';
  journalMode: 'DELETE' | 'TRUNCATE' | 'PERSIST' | 'MEMORY' | 'WAL' | 'OFF';
  busyTimeout: number;
  enableMigrations: boolean;
}

export interface DatabaseInfo {
  databasePath: string;
  databaseExists: boolean;
  databaseSizeBytes?: number;
  isConnected: boolean;
  isReady: boolean;
}

const IN_MEMORY = ':memory:';

/**
 * Database manager over better-sqlite3 with Drizzle ORM.
 * One shared instance serves the application; tests create their own in-memory ones.
 */
export class DatabaseManager {
  private static instance: DatabaseManager | null = null;
  private sqlite: Database.Database | null = null;
  private drizzleDb: AppDatabase | null = null;
  private readonly config: DatabaseConfig;

  constructor(config: Partial<DatabaseConfig> = {}) {
    const dbPath = config.path ?? Settings.DATABASE_PATH;
    this.config = {
      path: dbPath,
      enableForeignKeys: true,
      synchronous: 'NORMAL',
      journalMode: dbPath === IN_MEMORY ? 'MEMORY' : 'WAL',
      busyTimeout: 30000,
      enableMigrations: true,
      ...config,
    };
  }

  /**
   * Get the shared database manager instance
   */
  static getInstance(config?: Partial<DatabaseConfig>): DatabaseManager {
    if (!DatabaseManager.instance) {
      DatabaseManager.instance = new DatabaseManager(config);
    }
    return DatabaseManager.instance;
  }

  /**
   * Open the connection, apply pragmas and pending migrations
   */
  connect(): AppDatabase {
    if (this.drizzleDb) {
      return this.drizzleDb;
    }

    try {
      if (this.config.path !== IN_MEMORY) {
        fs.mkdirSync(path.dirname(path.resolve(this.config.path)), { recursive: true });
      }

      const sqlite = new Database(this.config.path);
      this.sqlite = sqlite;
      this.configurePragmas(sqlite);

      if (this.config.enableMigrations) {
        const applied = runMigrations(sqlite);
        if (applied.length > 0) {
          logger.info(`Database migrations applied: ${applied.join(', ')}`);
        }
      }

      this.drizzleDb = drizzle(sqlite, { schema });
      logger.info(`Database connected: ${this.config.path}`);
      return this.drizzleDb;
    } catch (error) {
      logger.error('Failed to initialize database', error);
      this.sqlite?.close();
      this.sqlite = null;
      throw new Error(
        `Database initialization failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  private configurePragmas(sqlite: Database.Database): void {
    const pragmas = [
      `journal_mode = ${this.config.journalMode}`,
      `foreign_keys = ${this.config.enableForeignKeys ? 'ON' : 'OFF'}`,
      `synchronous = ${this.config.synchronous}`,
      `busy_timeout = ${this.config.busyTimeout}`,
      'temp_store = MEMORY',
    ];

    for (const pragma of pragmas) {
      sqlite.pragma(pragma);
      logger.debug(`Applied pragma: ${pragma}`);
    }
  }

  /**
   * Get the Drizzle database instance (main interface for queries)
   */
  getDb(): AppDatabase {
    return this.connect();
  }

  /**
   * Run a callback inside a transaction; any thrown error rolls it back.
   * better-sqlite3 transactions are synchronous, so the callback must not await.
   */
  transaction<T>(callback: (tx: DbExecutor) => T): T {
    return this.connect().transaction(tx => callback(tx));
  }

  getDatabaseInfo(): DatabaseInfo {
    const databaseExists = this.config.path !== IN_MEMORY && fs.existsSync(this.config.path);
    const info: DatabaseInfo = {
      databasePath: this.config.path,
      databaseExists,
      isConnected: this.sqlite !== null,
      isReady: this.drizzleDb !== null,
    };
    if (databaseExists) {
      info.databaseSizeBytes = fs.statSync(this.config.path).size;
    }
    return info;
  }

  /**
   * Check database health and connectivity
   */
  healthCheck(): { status: 'healthy' | 'unhealthy'; details: string } {
    try {
      this.connect().get(sql`select 1`);
      return { status: 'healthy', details: 'Database is responsive' };
    } catch (error) {
      logger.error('Database health check failed', error);
      return {
        status: 'unhealthy',
        details: `Database error: ${error instanceof Error ? error.message : 'Unknown error'}`,
      };
    }
  }

  close(): void {
    if (this.sqlite) {
      this.sqlite.close();
      this.sqlite = null;
      this.drizzleDb = null;
      logger.info('Database connection closed');
    }
  }
}

