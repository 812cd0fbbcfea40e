import { createClient } from "redis";
import { logger } from "../utils/logger";
import { errorMessage } from "../utils/monitor-error";

/**
 * Redis client wrapper used by the Redis state backend.
 */
export class RedisClient {
  public client: ReturnType<typeof createClient>;
  private connected: boolean = false;
  private connecting: Promise<void> | null = null;

  constructor(url: string) {
    this.client = createClient({
      url,
      socket: {
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            return new Error("Max reconnection attempts reached");
          }
          return Math.min(Math.pow(2, retries) * 100, 3000);
        },
      },
    });

    this.client.on("connect", () => {
      this.connected = true;
    });

    this.client.on("error", (err: unknown) => {
      logger.error(`Redis error: ${errorMessage(err)}`);
      this.connected = false;
    });

    this.client.on("end", () => {
      this.connected = false;
    });
  }

  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Ensure Redis connection is established. Concurrent callers share the
   * same pending connect.
   */
  public async ensureConnection(): Promise<void> {
    if (this.connected) {
      return;
    }

    if (!this.connecting) {
      this.connecting = this.connect();
    }
    try {
      await this.connecting;
    } finally {
      this.connecting = null;
    }
  }

  private async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.connected = true;
    } catch (error) {
      logger.error(`Failed to connect to Redis: ${errorMessage(error)}`);
      throw error;
    }
  }

  public async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }

    try {
      await this.client.quit();
    } catch (error) {
      logger.warn(`Redis quit failed, forcing disconnect: ${errorMessage(error)}`);
      await this.client.disconnect();
    } finally {
      this.connected = false;
    }
  }

  public async get(key: string): Promise<string | null> {
    await this.ensureConnection();
    return this.client.get(key);
  }

  public async set(key: string, value: string): Promise<void> {
    await this.ensureConnection();
    await this.client.set(key, value);
  }

  public async del(...keys: string[]): Promise<number> {
    await this.ensureConnection();
    return this.client.del(keys);
  }
}
