import type { Store, SessionData } from "hono-sessions";

// The subset of ioredis commands the store issues
export interface RedisSessionCommands {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  unlink(...keys: string[]): Promise<number>;
}

interface RedisStoreOptions {
  client: RedisSessionCommands;
  prefix: string;
  ttl: number;
}

/**
 * hono-sessions store keeping each attendance session as JSON with a TTL.
 * Blank session ids never reach Redis.
 */
export class RedisStoreAdapter implements Store {
  constructor(private readonly options: RedisStoreOptions) {}

  async getSessionById(sessionId?: string): Promise<SessionData | null> {
    const key = this.keyFor(sessionId);
    if (!key) {
      return null;
    }

    try {
      const stored = await this.options.client.get(key);
      return stored ? JSON.parse(stored) : null;
    } catch (error) {
      // Unreadable sessions start over as a new visitor
      console.error(`Failed to read ${key}:`, error);
      return null;
    }
  }

  createSession(sessionId: string, initialData: SessionData): Promise<void> {
    return this.save(sessionId, initialData);
  }

  persistSessionData(sessionId: string, sessionData: SessionData): Promise<void> {
    return this.save(sessionId, sessionData);
  }

  async deleteSession(sessionId: string): Promise<void> {
    const key = this.keyFor(sessionId);
    if (key) {
      await this.logged("delete", key, () => this.options.client.unlink(key));
    }
  }

  private async save(sessionId: string, data: SessionData): Promise<void> {
    const key = this.keyFor(sessionId);
    if (key) {
      const { client, ttl } = this.options;
      await this.logged("save", key, () => client.setex(key, ttl, JSON.stringify(data)));
    }
  }

  private keyFor(sessionId: string | undefined): string | null {
    const id = sessionId?.trim();
    return id ? `${this.options.prefix}${id}` : null;
  }

  private async logged(operation: string, key: string, command: () => Promise<unknown>): Promise<void> {
    try {
      await command();
    } catch (error) {
      console.error(`Failed to ${operation} ${key}:`, error);
      throw error;
    }
  }
}

export default RedisStoreAdapter;
