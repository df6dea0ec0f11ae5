import fastify, { type FastifyInstance } from 'fastify';

import { getConfig } from './config';
import { errorHandlerPlugin } from './errors';
import { requestLoggingPlugin } from './logger';

export interface BuildServerOptions {
  disableDefaultHealthRoute?: boolean;
  disableSecurityHeaders?: boolean;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();

  const app = fastify({
    logger: options.logger ?? { level: config.runtime.logLevel },
    disableRequestLogging: true,
    trustProxy: true
  });

  await app.register(requestLoggingPlugin);
  await app.register(errorHandlerPlugin);

  if (!options.disableSecurityHeaders) {
    const helmet = await import('@fastify/helmet');
    await app.register(helmet.default, { global: true });
  }

  const cors = await import('@fastify/cors');
  await app.register(cors.default, {
    origin: true
  });

  if (!options.disableDefaultHealthRoute) {
    app.get('/health', async () => ({
      status: 'ok',
      service: config.runtime.serviceName
    }));
  }

  return app;
}
