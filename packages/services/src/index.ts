import Fastify from 'fastify';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';

import { createLogger, parseSessionSnapshot } from '@labyrinth/core';
import type { SessionStore } from '@labyrinth/core';

import { FileSessionStore } from './file-session-store.js';

export { FileSessionStore } from './file-session-store.js';
export type { FileSessionStoreOptions } from './file-session-store.js';

export interface CreateServerOptions {
  store: SessionStore;
  logger?: FastifyBaseLogger | boolean;
}

const loginParams = z.object({ login: z.string().min(1) });

export function createServer(options: CreateServerOptions) {
  const { store } = options;
  const app = Fastify({
    logger: options.logger ?? true
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/saves/:login', async (request, reply) => {
    const { login } = loginParams.parse(request.params);
    const snapshot = await store.loadSessionFor(login);
    if (!snapshot) {
      return reply.code(404).send({ error: `No saved session for ${login}` });
    }
    return snapshot;
  });

  app.put('/saves/:login', async (request, reply) => {
    const { login } = loginParams.parse(request.params);
    const snapshot = parseSessionSnapshot(request.body);
    if (!snapshot) {
      return reply.code(400).send({ error: 'Body is not a valid session snapshot' });
    }
    await store.saveSessionFor(login, snapshot);
    return reply.code(204).send();
  });

  app.delete('/saves/:login', async (request, reply) => {
    const { login } = loginParams.parse(request.params);
    await store.deleteSessionFor(login);
    return reply.code(204).send();
  });

  return app;
}

const serviceEnv = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().default('0.0.0.0'),
  LABYRINTH_SAVE_FILE: z.string().default('game_save.json'),
  LOG_LEVEL: z.string().default('info')
});

export async function startServer(env: NodeJS.ProcessEnv = process.env) {
  const config = serviceEnv.parse(env);
  const logger = createLogger({ level: config.LOG_LEVEL });
  const app = createServer({
    store: new FileSessionStore(config.LABYRINTH_SAVE_FILE, { logger }),
    logger
  });
  try {
    await app.listen({ port: config.PORT, host: config.HOST });
    return app;
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}
