// ============================================
// CAPITOL - Fastify App Setup
// ============================================

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import { env, isDevelopment, isTest } from './config/env.js';
import { openDatabase, closeDatabase, getDbPath, type DrizzleDb } from './db/drizzle.js';
import { errorHandlerPlugin, simulationPlugin } from './plugins/index.js';
import { registerControllers } from './controllers/index.js';
import type { TurnEngineOptions } from './simulation/engine.js';

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    db: DrizzleDb;
  }
}

export interface AppOptions {
  logger?: boolean;
  /** SQLite file, or ':memory:' */
  dbPath?: string;
  engine?: TurnEngineOptions;
}

function loggerOptions(enabled: boolean): FastifyServerOptions['logger'] {
  if (!enabled) return false;
  if (isDevelopment()) {
    return {
      level: env.LOG_LEVEL ?? 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level: env.LOG_LEVEL ?? 'info' };
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerOptions(options.logger ?? !isTest()),
  });

  // Decorate with database
  const connection = openDatabase(options.dbPath ?? getDbPath());
  fastify.decorate('db', connection.db);
  fastify.addHook('onClose', async () => {
    closeDatabase(connection);
  });

  // Register plugins
  await fastify.register(errorHandlerPlugin);
  await fastify.register(simulationPlugin, { engine: options.engine });

  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // API version info
  fastify.get('/api', async () => {
    return {
      name: 'Capitol Simulation API',
      version: '0.1.0',
      framework: 'Fastify',
    };
  });

  // Register all API controllers
  await registerControllers(fastify);

  return fastify;
}

export async function startApp(): Promise<FastifyInstance> {
  const app = await buildApp({
    engine: {
      seed: env.SIM_SEED,
      start: { year: env.SIM_START_YEAR, month: env.SIM_START_MONTH },
    },
  });

  try {
    const address = await app.listen({
      host: env.HOST,
      port: env.PORT,
    });
    app.log.info(`Capitol simulation server running at ${address}`);
    return app;
  } catch (err) {
    app.log.error(err);
    throw err;
  }
}
