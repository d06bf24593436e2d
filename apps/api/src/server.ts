import { createLogger, serializeError } from '@salonsvc/shared';

import { createApp } from './app';
import { loadConfig } from './config';
import { MemoryListCache, RedisListCache, type ListCache } from './listCache';
import { MediaStore, createCloudinaryClient } from './media';
import { ServiceObservability } from './observability';
import { InMemoryServiceRepository, PgServiceRepository, type ServiceRepository } from './persistence';
import { ServiceManager } from './serviceManager';

const config = loadConfig();
const logger = createLogger({ service: 'services-api', level: config.logLevel });
const observability = new ServiceObservability();

const repository: ServiceRepository = config.databaseUrl
  ? new PgServiceRepository(config.databaseUrl)
  : new InMemoryServiceRepository();

const cache: ListCache = config.redisUrl
  ? new RedisListCache({
      url: config.redisUrl,
      keyPrefix: config.listCacheKey,
      ttlSeconds: config.listCacheTtlSeconds,
      logger: logger.child({ component: 'list-cache' }),
    })
  : new MemoryListCache();

const media = new MediaStore(createCloudinaryClient(), logger.child({ component: 'media' }));

const manager = new ServiceManager({
  repository,
  cache,
  media,
  observability,
  logger: logger.child({ component: 'service-manager' }),
});

const app = createApp({ manager, observability, logger });

async function start(): Promise<void> {
  await manager.init();
  if (!config.databaseUrl) {
    logger.warn('DATABASE_URL not set, services are kept in memory');
  }
  const server = app.listen(config.port, () => {
    logger.info('services-api listening', {
      port: config.port,
      env: config.env,
      recordStore: config.databaseUrl ? 'postgres' : 'memory',
      listCache: config.redisUrl ? 'redis' : 'memory',
    });
  });

  const shutdown = (): void => {
    server.close(() => {
      manager.close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('shutdown failed', serializeError(error));
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

start().catch((error: unknown) => {
  logger.error('services-api failed to start', serializeError(error));
  process.exit(1);
});
