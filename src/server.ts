import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { AppConfig } from './infrastructure/index.js';
import { analysisRoutes } from './interfaces/http/index.js';

/**
 * Assembles the Fastify app without listening, so tests can `inject`.
 */
export async function buildServer(config: AppConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await fastify.register(analysisRoutes, { dmesgDefaults: config.dmesg });

  return fastify;
}
