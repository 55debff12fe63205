/**
 * Database connection shared by every agent
 */

import { DataSource } from 'typeorm';
import { SqlDatabase } from 'langchain/sql_db';
import { ConfigurationError, DatabaseConnectionError, describeError } from '../errors.js';

/**
 * Opens a resource once and hands the same instance to every caller.
 * Concurrent first calls share one open; a failed open is forgotten so the
 * next call tries again.
 */
export class SharedConnection<T> {
  private instance: T | undefined;
  private opening: Promise<T> | undefined;
  private attempts = 0;

  constructor(private readonly open: () => Promise<T>) {}

  async get(): Promise<T> {
    if (this.instance !== undefined) {
      return this.instance;
    }
    if (!this.opening) {
      this.attempts++;
      this.opening = this.open()
        .then((instance) => {
          this.instance = instance;
          return instance;
        })
        .finally(() => {
          this.opening = undefined;
        });
    }
    return this.opening;
  }

  get isOpen(): boolean {
    return this.instance !== undefined;
  }

  get openCount(): number {
    return this.attempts;
  }
}

export async function connectPagila(uri: string | undefined): Promise<SqlDatabase> {
  if (!uri) {
    throw new ConfigurationError('POSTGRES_DB_URI not set in environment');
  }

  try {
    const appDataSource = new DataSource({ type: 'postgres', url: uri });
    const db = await SqlDatabase.fromDataSourceParams({ appDataSource });
    console.log('✓ Successfully connected to the database.');
    console.log(`  Dialect: ${db.appDataSourceOptions.type}`);
    console.log(`  Usable tables: ${db.allTables.length}`);
    return db;
  } catch (error) {
    console.error('❌ Error connecting to database:', describeError(error));
    throw new DatabaseConnectionError(`Error connecting to database: ${describeError(error)}`, {
      cause: error,
    });
  }
}

export function createPagilaConnection(uri: string | undefined): SharedConnection<SqlDatabase> {
  return new SharedConnection(() => connectPagila(uri));
}
