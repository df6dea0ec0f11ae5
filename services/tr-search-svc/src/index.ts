import { buildServer, createAdminGuard, describeError, getLogger } from '@tr/common';

import { getSearchServiceConfig } from './config';
import { createSearchComponents } from './container';
import { registerRoutes } from './routes';

const INIT_RETRY_DELAY_MS = 5000;

async function bootstrap(): Promise<void> {
  process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'tr-search-svc';
  const logger = getLogger({ module: 'bootstrap' });

  try {
    const config = getSearchServiceConfig();
    const serviceName = config.base.runtime.serviceName;
    logger.info({ serviceName }, 'Configuration loaded');

    const server = await buildServer({ disableDefaultHealthRoute: true });
    const { service, pgClient, performanceTracker, probes } = createSearchComponents(config);
    const state = { isReady: false };

    const underPressure = await import('@fastify/under-pressure');
    await server.register(underPressure.default, {
      maxEventLoopDelay: 2000,
      maxHeapUsedBytes: 1_024 * 1_024 * 1024,
      maxRssBytes: 1_536 * 1_024 * 1024
    });

    await registerRoutes(server, {
      serviceName,
      service,
      probes,
      performanceTracker,
      adminGuard: createAdminGuard(),
      state
    });

    server.addHook('onClose', async () => {
      await service.close();
    });

    const port = Number(process.env.PORT ?? 8080);
    await server.listen({ port, host: '0.0.0.0' });
    logger.info({ port, service: serviceName }, 'Search service listening (verifying dependencies...)');

    const initializeDependencies = async (): Promise<void> => {
      try {
        await pgClient.initialize();
        state.isReady = true;
        logger.info('Search service fully initialized and ready');
      } catch (error) {
        logger.error({ error: describeError(error) }, 'Dependency verification failed, retrying in 5 seconds...');
        setTimeout(() => {
          void initializeDependencies();
        }, INIT_RETRY_DELAY_MS);
      }
    };

    void initializeDependencies();

    const shutdown = async () => {
      logger.info('Received shutdown signal.');
      try {
        await server.close();
        logger.info('Server closed gracefully.');
        process.exit(0);
      } catch (error) {
        logger.error({ error: describeError(error) }, 'Failed to close server gracefully.');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => {
      void shutdown();
    });
    process.on('SIGINT', () => {
      void shutdown();
    });
  } catch (error) {
    logger.error({ error: describeError(error) }, 'Failed to bootstrap the search service');
    process.exit(1);
  }
}

void bootstrap();
