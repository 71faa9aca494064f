/**
 * Artifact Store
 *
 * Key-value storage for serialized per-game artifacts. The in-memory
 * store serves single runs; the Redis store keeps one hash per game so
 * later processes can resume from what is already computed.
 */

import { cfg } from '../core/config.js';
import { CacheError, toError } from '../errors/index.js';
import { KEYS } from './keys.js';

export interface ArtifactStore {
  get(gameId: string, kind: string): Promise<string | undefined>;
  set(gameId: string, kind: string, value: string): Promise<void>;
  /** Artifact kinds stored for a game */
  kinds(gameId: string): Promise<string[]>;
  /** Removes the given kinds, or every artifact of the game when none are given */
  invalidate(gameId: string, kinds?: readonly string[]): Promise<void>;
}

export class MemoryArtifactStore implements ArtifactStore {
  private readonly games = new Map<string, Map<string, string>>();

  async get(gameId: string, kind: string): Promise<string | undefined> {
    return this.games.get(gameId)?.get(kind);
  }

  async set(gameId: string, kind: string, value: string): Promise<void> {
    let game = this.games.get(gameId);
    if (!game) {
      game = new Map();
      this.games.set(gameId, game);
    }
    game.set(kind, value);
  }

  async kinds(gameId: string): Promise<string[]> {
    return [...(this.games.get(gameId)?.keys() ?? [])].sort();
  }

  async invalidate(gameId: string, kinds?: readonly string[]): Promise<void> {
    if (kinds === undefined) {
      this.games.delete(gameId);
      return;
    }
    const game = this.games.get(gameId);
    for (const kind of kinds) game?.delete(kind);
  }
}

/**
 * Hash commands the Redis store uses; an ioredis client satisfies it
 */
export interface HashClient {
  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string): Promise<number>;
  hkeys(key: string): Promise<string[]>;
  hdel(key: string, ...fields: string[]): Promise<number>;
  del(key: string): Promise<number>;
}

export class RedisArtifactStore implements ArtifactStore {
  constructor(
    private readonly client: HashClient,
    private readonly prefix: string = cfg.redis.keyPrefix
  ) {}

  private async run<T>(operation: string, gameId: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (err) {
      const error = toError(err);
      throw new CacheError(`Redis ${operation} failed for game ${gameId}: ${error.message}`, operation, error);
    }
  }

  async get(gameId: string, kind: string): Promise<string | undefined> {
    const value = await this.run('hget', gameId, () => this.client.hget(KEYS.game(this.prefix, gameId), kind));
    return value ?? undefined;
  }

  async set(gameId: string, kind: string, value: string): Promise<void> {
    await this.run('hset', gameId, () => this.client.hset(KEYS.game(this.prefix, gameId), kind, value));
  }

  async kinds(gameId: string): Promise<string[]> {
    const fields = await this.run('hkeys', gameId, () => this.client.hkeys(KEYS.game(this.prefix, gameId)));
    return fields.sort();
  }

  async invalidate(gameId: string, kinds?: readonly string[]): Promise<void> {
    const key = KEYS.game(this.prefix, gameId);
    if (kinds === undefined) {
      await this.run('del', gameId, () => this.client.del(key));
    } else if (kinds.length > 0) {
      await this.run('hdel', gameId, () => this.client.hdel(key, ...kinds));
    }
  }
}
