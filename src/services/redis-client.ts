import { createClient } from "redis";
import dotenv from "dotenv";
import { componentLogger } from "../logger";

// Load environment variables
dotenv.config();

const log = componentLogger("redis");

/**
 * Redis client wrapper for the application.
 */
export class RedisClient {
  // Class property for singleton instance
  private static instance: RedisClient | null = null;

  public client: ReturnType<typeof createClient>;
  private connected: boolean = false;
  private connecting: Promise<void> | null = null;

  constructor() {
    this.client = createClient({
      url: `redis://${process.env.REDIS_HOST || "localhost"}:${
        process.env.REDIS_PORT || 6379
      }`,
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
      log.error({ err }, "Redis error");
      this.connected = false;
    });

    this.client.on("end", () => {
      this.connected = false;
    });
  }

  /**
   * Reset the singleton instance (for testing)
   */
  public static async resetInstance(): Promise<void> {
    if (RedisClient.instance) {
      if (RedisClient.instance.isConnected()) {
        await RedisClient.instance.disconnect();
      }
      RedisClient.instance = null;
    }
  }

  /**
   * Get or create the singleton instance
   */
  public static getInstance(): RedisClient {
    if (!RedisClient.instance) {
      RedisClient.instance = new RedisClient();
    }
    return RedisClient.instance;
  }

  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Ensure Redis connection is established. Concurrent callers share the
   * same pending connection attempt.
   */
  public async ensureConnection(): Promise<void> {
    if (this.connected) {
      return;
    }

    if (!this.connecting) {
      this.connecting = this.client
        .connect()
        .then(() => {
          this.connected = true;
        })
        .finally(() => {
          this.connecting = null;
        });
    }

    try {
      await this.connecting;
    } catch (error) {
      log.error({ err: error }, "Failed to connect to Redis");
      throw error;
    }
  }

  /**
   * Disconnect from Redis, falling back to a hard disconnect when QUIT fails
   */
  public async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }

    try {
      await this.client.quit();
    } catch (error) {
      log.warn({ err: error }, "QUIT failed, forcing disconnect");
      await this.client.disconnect();
    } finally {
      this.connected = false;
    }
  }

  // Helper methods
  public async hSet(key: string, values: Record<string, string>): Promise<number> {
    await this.ensureConnection();
    return this.client.hSet(key, values);
  }

  public async hGetAll(key: string): Promise<Record<string, string>> {
    await this.ensureConnection();
    return this.client.hGetAll(key);
  }

  /**
   * Collect every key matching a pattern with SCAN
   */
  public async scanKeys(pattern: string): Promise<string[]> {
    await this.ensureConnection();

    let keys: string[] = [];
    let cursor = 0;
    do {
      const result = await this.client.scan(cursor, {
        MATCH: pattern,
        COUNT: 1000,
      });
      cursor = result.cursor;
      keys = keys.concat(result.keys);
    } while (cursor !== 0);

    return keys;
  }

  public async del(keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    await this.ensureConnection();
    return this.client.del(keys);
  }
}

// Export singleton instance using getInstance pattern
export const redisClient = RedisClient.getInstance();
