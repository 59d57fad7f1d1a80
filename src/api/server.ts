import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { Composer } from '../runtime/composer.js';
import { createRegistry } from '../skills/builtin.js';
import type { Registry } from '../skills/registry.js';
import { contextDefaults, loadProjectConfig, type LoadedConfig } from '../shared/config.js';
import { errorMessage, isCompileError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { registerCompileRoutes } from './routes/compile.js';
import { registerSkillRoutes } from './routes/skills.js';

export interface ServerOptions {
  host?: string;
  port?: number;
  config?: LoadedConfig;
  /** Share an already-loaded registry instead of building one. */
  registry?: Registry;
}

export interface ServerHandle {
  fastify: FastifyInstance;
  host: string;
  port: number;
}

const LOOPBACK_HOSTS = new Set(['127.0.0.1', 'localhost', '::1']);
const LOOPBACK_ORIGIN = /^https?:\/\/(localhost|127\.0\.0\.1|\[::1\])(:\d+)?$/;

export async function createServer(opts: ServerOptions = {}): Promise<ServerHandle> {
  const config = opts.config ?? loadProjectConfig();
  const host = opts.host ?? process.env['SKILLC_API_HOST'] ?? config.api.host;
  const port = opts.port ?? parseInt(process.env['SKILLC_API_PORT'] ?? String(config.api.port), 10);

  if (!LOOPBACK_HOSTS.has(host)) {
    logger.warn('Non-loopback bind requested; the compile API has no authentication.', { host });
  }

  const registry = opts.registry ?? createRegistry({ skillDirs: config.skill_dirs });
  const composer = new Composer({ registry, defaults: contextDefaults(config) });

  const fastify = Fastify({
    logger: false,
    trustProxy: false,
    bodyLimit: 1024 * 1024,
  });

  // CORS: loopback origins only
  await fastify.register(cors, {
    origin: (origin, cb) => {
      cb(null, origin === undefined || LOOPBACK_ORIGIN.test(origin));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('X-XSS-Protection', '0');
    reply.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    reply.header('Referrer-Policy', 'no-referrer');
  });

  fastify.setErrorHandler(async (err, req, reply) => {
    if (isCompileError(err)) {
      const status = err.code === 'invariant' ? 500 : 400;
      if (status === 500) logger.error('Compiler invariant violated', { url: req.url, error: err.message });
      return reply.status(status).send(err.toJSON());
    }
    const status = err.statusCode ?? 500;
    if (status >= 500) logger.error('Request failed', { url: req.url, error: errorMessage(err) });
    return reply.status(status).send({ error: err.name, message: err.message });
  });

  const routeOpts = { registry, composer };
  await registerSkillRoutes(fastify, routeOpts);
  await registerCompileRoutes(fastify, routeOpts);

  return { fastify, host, port };
}

export async function startServer(opts: ServerOptions = {}): Promise<void> {
  const { fastify, host, port } = await createServer(opts);

  try {
    await fastify.listen({ host, port });
    logger.info('skillc API server listening', { host, port, url: `http://${host}:${port}/v1` });
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}
