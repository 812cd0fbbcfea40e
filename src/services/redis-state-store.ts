import { AddressPair, PersistedState } from "../models/address-data";
import { logger } from "../utils/logger";
import { MonitorError, errorMessage } from "../utils/monitor-error";
import { RedisClient } from "./redis-client";
import { StateStore, decodeState, serializeState } from "./state-store";

/**
 * Keeps the address record and the update mark under two string keys.
 * Redis SET replaces a value whole, so writes need no temp-key dance.
 */
export class RedisStateStore implements StateStore {
  private readonly stateKey: string;
  private readonly markKey: string;

  constructor(
    private readonly redis: RedisClient,
    keyPrefix: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.stateKey = `${keyPrefix}:state`;
    this.markKey = `${keyPrefix}:update-mark`;
  }

  async load(): Promise<AddressPair> {
    const state = await this.loadState();
    return state
      ? { ipv4: state.ipv4, ipv6: state.ipv6 }
      : { ipv4: null, ipv6: null };
  }

  async loadState(): Promise<PersistedState | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.stateKey);
    } catch (error) {
      logger.error(`Error reading ${this.stateKey}: ${errorMessage(error)}`);
      raw = "";
    }
    return decodeState(raw, `redis key ${this.stateKey}`);
  }

  async save(pair: AddressPair): Promise<void> {
    try {
      await this.redis.set(this.stateKey, serializeState(pair, this.now()));
      logger.debug(
        `Saved state: IPv4=${pair.ipv4 ?? "None"}, IPv6=${pair.ipv6 ?? "None"}`
      );
    } catch (error) {
      throw new MonitorError(
        "E_STATE_WRITE",
        `Error saving state to redis key ${this.stateKey}: ${errorMessage(error)}`,
        true,
        error
      );
    }
  }

  async loadUpdateMark(): Promise<string | null> {
    try {
      const version = (await this.redis.get(this.markKey))?.trim() ?? "";
      return version === "" ? null : version;
    } catch (error) {
      logger.error(`Error reading ${this.markKey}: ${errorMessage(error)}`);
      return null;
    }
  }

  async saveUpdateMark(version: string): Promise<void> {
    try {
      await this.redis.set(this.markKey, version);
    } catch (error) {
      throw new MonitorError(
        "E_STATE_WRITE",
        `Error saving update mark to redis key ${this.markKey}: ${errorMessage(error)}`,
        true,
        error
      );
    }
  }

  async clear(): Promise<void> {
    await this.redis.del(this.stateKey, this.markKey);
  }
}
