import { createClient } from 'redis';
import { Config } from '../config/config';
import { logger } from '../utils/logger';

type RedisClient = ReturnType<typeof createClient>;

/** JSON key/value cache with expiry; the subset of Redis the registry uses. */
export interface Cache {
  get<T>(key: string): Promise<T | null>;
  set(key: string, value: unknown, expirationSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
}

export class RedisCache implements Cache {
  private client: RedisClient | null = null;

  constructor(private settings: Config['redis']) {}

  async connect(): Promise<void> {
    try {
      this.client = createClient({
        socket: {
          host: this.settings.host,
          port: this.settings.port,
        },
        ...(this.settings.password ? { password: this.settings.password } : {}),
      });

      this.client.on('error', (err) => {
        logger.error('Redis client error', { error: err });
      });

      this.client.on('ready', () => {
        logger.info('Redis client ready');
      });

      await this.client.connect();
      logger.info('Redis connected successfully');
    } catch (error) {
      logger.error('Failed to connect to Redis', { error });
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      logger.info('Redis disconnected');
    }
  }

  async ping(): Promise<void> {
    await this.getClient().ping();
  }

  async get<T>(key: string): Promise<T | null> {
    const value = await this.getClient().get(key);
    if (value === null) {
      return null;
    }
    return JSON.parse(value) as T;
  }

  async set(key: string, value: unknown, expirationSeconds?: number): Promise<void> {
    const stringValue = JSON.stringify(value);
    if (expirationSeconds) {
      await this.getClient().setEx(key, expirationSeconds, stringValue);
    } else {
      await this.getClient().set(key, stringValue);
    }
  }

  async del(key: string): Promise<void> {
    await this.getClient().del(key);
  }

  private getClient(): RedisClient {
    if (!this.client) {
      throw new Error('Redis client not connected');
    }
    return this.client;
  }
}
