/**
 * Centralized Database Connection Factory
 *
 * One pg pool and one drizzle handle per service, created lazily on first use so
 * importing a service never requires a configured database.
 *
 * @example
 * import { createDatabaseConnectionFactory } from '@music-catalog/platform-core';
 * import * as schema from './schema/catalog-schema';
 *
 * const { getDatabase, close } = createDatabaseConnectionFactory({
 *   serviceName: 'catalog-service',
 *   envVarName: 'CATALOG_DATABASE_URL',
 *   schema,
 * });
 */

import { Pool } from 'pg';
import type { Logger } from 'winston';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { createLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import { loadDatabaseSettings, type DatabaseEnvOptions } from '../config/database-config.js';

export interface DatabaseConfig<TSchema extends Record<string, unknown>> extends DatabaseEnvOptions {
  schema: TSchema;
}

export interface DatabaseHealth {
  status: 'healthy' | 'unhealthy';
  latencyMs: number;
}

export interface DatabaseConnectionFactoryInstance<TSchema extends Record<string, unknown>> {
  getDatabase: () => NodePgDatabase<TSchema>;
  healthCheck: () => Promise<DatabaseHealth>;
  close: () => Promise<void>;
}

class DatabaseConnectionFactoryClass<TSchema extends Record<string, unknown>> {
  private pool: Pool | null = null;
  private dbConnection: NodePgDatabase<TSchema> | null = null;
  private readonly logger: Logger;

  constructor(private readonly config: DatabaseConfig<TSchema>) {
    this.logger = createLogger(`${config.serviceName}-database`);
  }

  private getPool(): Pool {
    if (!this.pool) {
      try {
        const settings = loadDatabaseSettings(this.config);
        this.pool = new Pool({
          connectionString: settings.connectionString,
          max: settings.poolMax,
          idleTimeoutMillis: 30000,
          connectionTimeoutMillis: 10000,
          ssl: settings.ssl,
        });
        this.pool.on('error', error => {
          this.logger.error('Idle database client error', { error: serializeError(error) });
        });
        this.logger.debug('SQL connection pool established', {
          serviceName: this.config.serviceName,
          poolMax: settings.poolMax,
        });
      } catch (error) {
        this.logger.error('SQL connection failed', {
          serviceName: this.config.serviceName,
          error: serializeError(error),
        });
        throw error;
      }
    }
    return this.pool;
  }

  public getDatabase(): NodePgDatabase<TSchema> {
    if (!this.dbConnection) {
      this.dbConnection = drizzle(this.getPool(), { schema: this.config.schema });
      this.logger.debug('Drizzle database connection established');
    }
    return this.dbConnection;
  }

  public async healthCheck(): Promise<DatabaseHealth> {
    const startTime = Date.now();
    try {
      await this.getPool().query('SELECT 1');
      return { status: 'healthy', latencyMs: Date.now() - startTime };
    } catch (error) {
      this.logger.warn('Database health check failed', { error: serializeError(error) });
      return { status: 'unhealthy', latencyMs: Date.now() - startTime };
    }
  }

  public async close(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    this.dbConnection = null;
    if (pool) {
      await pool.end();
      this.logger.info('Database connection pool closed', { serviceName: this.config.serviceName });
    }
  }
}

export function createDatabaseConnectionFactory<TSchema extends Record<string, unknown>>(
  config: DatabaseConfig<TSchema>
): DatabaseConnectionFactoryInstance<TSchema> {
  let instance: DatabaseConnectionFactoryClass<TSchema> | null = null;

  const getInstance = (): DatabaseConnectionFactoryClass<TSchema> => {
    if (!instance) {
      instance = new DatabaseConnectionFactoryClass(config);
    }
    return instance;
  };

  const closeFactory = async (): Promise<void> => {
    if (!instance) return;
    const closing = instance;
    instance = null;
    await closing.close();
  };

  return {
    getDatabase: () => getInstance().getDatabase(),
    healthCheck: () => getInstance().healthCheck(),
    close: closeFactory,
  };
}

