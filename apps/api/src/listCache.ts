import { createClient } from 'redis';
import { z } from 'zod';

import type { ServiceRecord } from '@salonsvc/contracts';
import { serializeError, type Logger } from '@salonsvc/shared';

export type CacheLookup =
  | { hit: true; records: ServiceRecord[] }
  | { hit: false; generation: number | null };

/**
 * Cache of the full, unpaginated service listing.
 *
 * Every mutation bumps a generation counter. A reader that missed carries the
 * generation it saw, and `populate` refuses to store a listing read before a
 * later invalidation, so a slow miss can never resurrect stale data.
 * None of the methods throw; a broken backing store behaves as a permanent miss.
 */
export interface ListCache {
  init(): Promise<void>;
  close(): Promise<void>;
  get(): Promise<CacheLookup>;
  populate(records: ServiceRecord[], generation: number | null): Promise<boolean>;
  invalidate(): Promise<void>;
}

export class MemoryListCache implements ListCache {
  private records: ServiceRecord[] | null = null;

  private generation = 0;

  async init(): Promise<void> {}

  async close(): Promise<void> {
    this.records = null;
  }

  async get(): Promise<CacheLookup> {
    if (this.records) {
      return { hit: true, records: this.records.map((record) => ({ ...record })) };
    }
    return { hit: false, generation: this.generation };
  }

  async populate(records: ServiceRecord[], generation: number | null): Promise<boolean> {
    if (generation === null || generation !== this.generation) return false;
    this.records = records.map((record) => ({ ...record }));
    return true;
  }

  async invalidate(): Promise<void> {
    this.generation += 1;
    this.records = null;
  }
}

const cachedRecordSchema = z.object({
  serviceId: z.number(),
  name: z.string(),
  description: z.string().nullable(),
  duration: z.number(),
  price: z.number(),
  imageUrl: z.string().nullable(),
  salonId: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const cachedListingSchema = z.array(cachedRecordSchema);

// KEYS[1] generation counter, KEYS[2] listing; ARGV: expected generation, payload, ttl.
const POPULATE_SCRIPT = `
if (redis.call('GET', KEYS[1]) or '0') == ARGV[1] then
  redis.call('SET', KEYS[2], ARGV[2], 'EX', ARGV[3])
  return 1
end
return 0
`;

/** The redis operations the list cache is built on. */
export interface RedisListConnection {
  readonly isOpen: boolean;
  readonly isReady: boolean;
  connect(): Promise<void>;
  quit(): Promise<void>;
  mGet(keys: string[]): Promise<Array<string | null>>;
  /** Stores `payload` under `listKey` only while `generationKey` still holds `expected`. */
  setIfGeneration(
    generationKey: string,
    listKey: string,
    expected: number,
    payload: string,
    ttlSeconds: number,
  ): Promise<boolean>;
  /** Bumps the generation and drops the listing in one transaction. */
  bumpGeneration(generationKey: string, listKey: string): Promise<void>;
}

/**
 * Wraps a node-redis client. The offline queue is off, so commands issued while
 * the connection is down reject at once instead of waiting for a reconnect.
 */
export function createRedisListConnection(url: string, logger: Logger): RedisListConnection {
  const client = createClient({ url, disableOfflineQueue: true });
  client.on('error', (error: unknown) => {
    logger.error('list cache redis error', serializeError(error));
  });

  return {
    get isOpen() {
      return client.isOpen;
    },
    get isReady() {
      return client.isReady;
    },
    async connect() {
      await client.connect();
    },
    async quit() {
      await client.quit();
    },
    mGet: (keys) => client.mGet(keys),
    async setIfGeneration(generationKey, listKey, expected, payload, ttlSeconds) {
      const stored = await client.eval(POPULATE_SCRIPT, {
        keys: [generationKey, listKey],
        arguments: [String(expected), payload, String(ttlSeconds)],
      });
      return stored === 1;
    },
    async bumpGeneration(generationKey, listKey) {
      await client.multi().incr(generationKey).del(listKey).exec();
    },
  };
}

export type RedisListCacheOptions = {
  url: string;
  keyPrefix: string;
  ttlSeconds: number;
  logger: Logger;
  connection?: RedisListConnection;
};

export class RedisListCache implements ListCache {
  private readonly connection: RedisListConnection;

  private readonly listKey: string;

  private readonly generationKey: string;

  private readonly ttlSeconds: number;

  private readonly logger: Logger;

  // Set when an invalidation could not reach redis; reads miss until one succeeds.
  private degraded = false;

  constructor(options: RedisListCacheOptions) {
    this.connection = options.connection ?? createRedisListConnection(options.url, options.logger);
    this.listKey = `${options.keyPrefix}:entries`;
    this.generationKey = `${options.keyPrefix}:generation`;
    this.ttlSeconds = options.ttlSeconds;
    this.logger = options.logger;
  }

  get isDegraded(): boolean {
    return this.degraded;
  }

  async init(): Promise<void> {
    if (!this.connection.isOpen) {
      await this.connection.connect();
    }
  }

  async close(): Promise<void> {
    if (this.connection.isOpen) {
      await this.connection.quit();
    }
  }

  async get(): Promise<CacheLookup> {
    if (this.degraded) {
      await this.invalidate();
      if (this.degraded) return { hit: false, generation: null };
    }
    if (!this.connection.isReady) {
      this.logger.warn('list cache read skipped', { reason: 'redis not ready' });
      return { hit: false, generation: null };
    }

    try {
      const [listing, generation] = await this.connection.mGet([this.listKey, this.generationKey]);
      const records = listing ? this.parseListing(listing) : null;
      if (records) {
        return { hit: true, records };
      }
      return { hit: false, generation: generation ? Number(generation) : 0 };
    } catch (error) {
      this.logger.warn('list cache read failed', serializeError(error));
      return { hit: false, generation: null };
    }
  }

  async populate(records: ServiceRecord[], generation: number | null): Promise<boolean> {
    if (generation === null || this.degraded || !this.connection.isReady) return false;

    try {
      return await this.connection.setIfGeneration(
        this.generationKey,
        this.listKey,
        generation,
        JSON.stringify(records),
        this.ttlSeconds,
      );
    } catch (error) {
      this.logger.warn('list cache populate failed', serializeError(error));
      return false;
    }
  }

  async invalidate(): Promise<void> {
    if (!this.connection.isReady) {
      this.degraded = true;
      this.logger.error('list cache invalidate failed', { reason: 'redis not ready' });
      return;
    }

    try {
      await this.connection.bumpGeneration(this.generationKey, this.listKey);
      this.degraded = false;
    } catch (error) {
      this.degraded = true;
      this.logger.error('list cache invalidate failed', serializeError(error));
    }
  }

  private parseListing(raw: string): ServiceRecord[] | null {
    try {
      const parsed = cachedListingSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      this.logger.warn('list cache entry has unexpected shape', { key: this.listKey });
      return null;
    } catch (error) {
      this.logger.warn('list cache entry is not valid JSON', { key: this.listKey, ...serializeError(error) });
      return null;
    }
  }
}
