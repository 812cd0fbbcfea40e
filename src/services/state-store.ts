import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import { AddressPair, PersistedState } from "../models/address-data";
import { logger } from "../utils/logger";
import { MonitorError, errorMessage } from "../utils/monitor-error";
import { IpUtil } from "./ip-util";

/**
 * Durable storage for the last observed addresses and the last announced
 * release. The store is the only writer of both records.
 */
export interface StateStore {
  load(): Promise<AddressPair>;
  loadState(): Promise<PersistedState | null>;
  save(pair: AddressPair): Promise<void>;
  loadUpdateMark(): Promise<string | null>;
  saveUpdateMark(version: string): Promise<void>;
  clear(): Promise<void>;
}

export type StoredFormat = "structured" | "legacy";

export interface ParsedState {
  format: StoredFormat;
  state: PersistedState;
}

type StateParser = (raw: string) => ParsedState | null;

const structuredSchema = z.object({
  ipv4: z.string().nullable().optional(),
  ipv6: z.string().nullable().optional(),
  last_updated: z.string().optional(),
});

/**
 * Current format: `{"ipv4": ..., "ipv6": ..., "last_updated": ...}`
 */
export const parseStructuredState: StateParser = (raw) => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = structuredSchema.safeParse(json);
  if (!result.success) return null;

  return {
    format: "structured",
    state: {
      ipv4: result.data.ipv4 || null,
      ipv6: result.data.ipv6 || null,
      last_updated: result.data.last_updated ?? "",
    },
  };
};

/**
 * First-generation format: the file holds nothing but an IPv4 address
 */
export const parseLegacyState: StateParser = (raw) => {
  const text = raw.trim().replace(/^"(.*)"$/, "$1");
  if (!IpUtil.isValidIpv4(text)) return null;

  return {
    format: "legacy",
    state: { ipv4: text, ipv6: null, last_updated: "" },
  };
};

export const STATE_PARSERS: ReadonlyArray<StateParser> = [
  parseStructuredState,
  parseLegacyState,
];

/**
 * Try each known format in order; null when none matches
 */
export function parseStoredState(raw: string): ParsedState | null {
  if (raw.trim() === "") return null;

  for (const parser of STATE_PARSERS) {
    const parsed = parser(raw);
    if (parsed) return parsed;
  }
  return null;
}

export function serializeState(pair: AddressPair, now: Date): string {
  const record: PersistedState = {
    ipv4: pair.ipv4,
    ipv6: pair.ipv6,
    last_updated: now.toISOString(),
  };
  return JSON.stringify(record, null, 2);
}

/**
 * Shared read path for every backend: unreadable or unrecognised content is
 * logged and reported as "no prior state".
 */
export function decodeState(raw: string | null, source: string): PersistedState | null {
  if (raw === null) {
    logger.info(`No previous state found at ${source} (first run)`);
    return null;
  }

  const parsed = parseStoredState(raw);
  if (!parsed) {
    logger.warn(`State at ${source} is empty or unreadable, treating as first run`);
    return null;
  }

  if (parsed.format === "legacy") {
    logger.info(`Migrating legacy state at ${source} (IPv4 ${parsed.state.ipv4})`);
  }
  return parsed.state;
}

export interface FileStateStoreOptions {
  stateFile: string;
  updateMarkFile: string;
  now?: () => Date;
}

/**
 * File-backed store. Writes go to a temporary sibling file which is then
 * renamed over the target, so readers never see a partial record.
 */
export class FileStateStore implements StateStore {
  private readonly now: () => Date;

  constructor(private readonly options: FileStateStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<AddressPair> {
    const state = await this.loadState();
    return state
      ? { ipv4: state.ipv4, ipv6: state.ipv6 }
      : { ipv4: null, ipv6: null };
  }

  async loadState(): Promise<PersistedState | null> {
    const raw = await this.readText(this.options.stateFile);
    return decodeState(raw, this.options.stateFile);
  }

  async save(pair: AddressPair): Promise<void> {
    try {
      await this.writeAtomic(
        this.options.stateFile,
        serializeState(pair, this.now())
      );
      logger.debug(
        `Saved state: IPv4=${pair.ipv4 ?? "None"}, IPv6=${pair.ipv6 ?? "None"}`
      );
    } catch (error) {
      throw new MonitorError(
        "E_STATE_WRITE",
        `Error saving state to ${this.options.stateFile}: ${errorMessage(error)}`,
        true,
        error
      );
    }
  }

  async loadUpdateMark(): Promise<string | null> {
    const raw = await this.readText(this.options.updateMarkFile);
    const version = raw?.trim() ?? "";
    return version === "" ? null : version;
  }

  async saveUpdateMark(version: string): Promise<void> {
    try {
      await this.writeAtomic(this.options.updateMarkFile, version);
    } catch (error) {
      throw new MonitorError(
        "E_STATE_WRITE",
        `Error saving update mark to ${this.options.updateMarkFile}: ${errorMessage(error)}`,
        true,
        error
      );
    }
  }

  async clear(): Promise<void> {
    await fs.remove(this.options.stateFile);
    await fs.remove(this.options.updateMarkFile);
  }

  private async readText(file: string): Promise<string | null> {
    try {
      if (!(await fs.pathExists(file))) {
        return null;
      }
      return await fs.readFile(file, "utf8");
    } catch (error) {
      logger.error(`Error reading ${file}: ${errorMessage(error)}`);
      return "";
    }
  }

  private async writeAtomic(file: string, contents: string): Promise<void> {
    const dir = path.dirname(file);
    if (!(await fs.pathExists(dir))) {
      await fs.ensureDir(dir);
      logger.info(`Created state directory: ${dir}`);
    }

    const tmp = `${file}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmp, contents, "utf8");
      await fs.move(tmp, file, { overwrite: true });
    } catch (error) {
      await fs.remove(tmp);
      throw error;
    }
  }
}
