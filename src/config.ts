import path from "path";
import { APP_NAME, APP_VERSION } from "./version";

export type Env = Record<string, string | undefined>;

export type StateBackend = "file" | "redis";
export type TelegramParseMode = "HTML" | "Markdown" | "MarkdownV2";

export interface DiscordSettings {
  enabled: boolean;
  webhookUrl: string;
  avatarUrl: string | null;
}

export interface TelegramSettings {
  enabled: boolean;
  botToken: string;
  chatId: string;
  parseMode: TelegramParseMode;
}

export interface EmailSettings {
  enabled: boolean;
  smtpHost: string;
  smtpPort: number;
  smtpUser: string;
  smtpPassword: string;
  from: string;
  to: string[];
  useTls: boolean;
  useSsl: boolean;
  subjectPrefix: string;
}

export interface StateSettings {
  backend: StateBackend;
  ipStateFile: string;
  updateMarkFile: string;
  redisUrl: string;
  redisKeyPrefix: string;
}

export interface UpdateSettings {
  enabled: boolean;
  intervalSeconds: number;
  onStartup: boolean;
  feedUrl: string;
}

export interface RetrySettings {
  maxRetries: number;
  baseDelayMs: number;
}

export interface MonitorConfig {
  serverName: string;
  botName: string;
  version: string;
  checkIntervalSeconds: number;
  monitorIpv4: boolean;
  monitorIpv6: boolean;
  ipinfoToken: string | null;
  requestTimeoutMs: number;
  retry: RetrySettings;
  state: StateSettings;
  discord: DiscordSettings;
  telegram: TelegramSettings;
  email: EmailSettings;
  updates: UpdateSettings;
  statusPort: number | null;
  logFile: string | null;
  verbose: boolean;
}

export const DEFAULT_UPDATE_FEED_URL =
  "https://api.github.com/repos/wan-sentinel/wan-sentinel/releases/latest";

function readString(env: Env, key: string, fallback = ""): string {
  const value = env[key];
  return value === undefined ? fallback : value.trim();
}

function readOptional(env: Env, key: string): string | null {
  const value = readString(env, key);
  return value === "" ? null : value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = readString(env, key).toLowerCase();
  if (value === "true") return true;
  if (value === "false") return false;
  return fallback;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const value = readString(env, key);
  if (value === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readParseMode(env: Env): TelegramParseMode {
  const mode = readString(env, "TELEGRAM_PARSE_MODE", "HTML");
  return mode === "Markdown" || mode === "MarkdownV2" ? mode : "HTML";
}

function resolvePath(value: string): string {
  return path.isAbsolute(value) ? value : path.join(process.cwd(), value);
}

/**
 * Build the immutable runtime configuration from environment variables.
 * Values are expected to have passed {@link ConfigValidator} already; anything
 * unparsable falls back to its default.
 */
export function loadConfig(env: Env = process.env): MonitorConfig {
  const statusPort = readNumber(env, "STATUS_PORT", 0);
  const logFile = readOptional(env, "LOG_FILE");
  const backend = readString(env, "STATE_BACKEND", "file").toLowerCase();

  const config: MonitorConfig = {
    serverName: readString(env, "SERVER_NAME", APP_NAME),
    botName: readString(env, "BOT_NAME", APP_NAME),
    version: APP_VERSION,
    checkIntervalSeconds: readNumber(env, "CHECK_INTERVAL", 900),
    monitorIpv4: readBoolean(env, "MONITOR_IPV4", true),
    monitorIpv6: readBoolean(env, "MONITOR_IPV6", true),
    ipinfoToken: readOptional(env, "IPINFO_TOKEN"),
    requestTimeoutMs: readNumber(env, "REQUEST_TIMEOUT", 10) * 1000,
    retry: {
      maxRetries: readNumber(env, "NOTIFY_MAX_RETRIES", 3),
      baseDelayMs: readNumber(env, "NOTIFY_RETRY_BASE_DELAY", 2) * 1000,
    },
    state: {
      backend: backend === "redis" ? "redis" : "file",
      ipStateFile: resolvePath(readString(env, "IP_DB_FILE", "data/ipinfo.db")),
      updateMarkFile: resolvePath(
        readString(env, "UPDATE_MARK_FILE", "data/last_update_notified.txt")
      ),
      redisUrl: readString(env, "REDIS_URL", "redis://localhost:6379"),
      redisKeyPrefix: readString(env, "REDIS_KEY_PREFIX", APP_NAME),
    },
    discord: {
      enabled: readBoolean(env, "DISCORD_ENABLED", false),
      webhookUrl: readString(env, "DISCORD_WEBHOOK_URL"),
      avatarUrl: readOptional(env, "DISCORD_AVATAR_URL"),
    },
    telegram: {
      enabled: readBoolean(env, "TELEGRAM_ENABLED", false),
      botToken: readString(env, "TELEGRAM_BOT_TOKEN"),
      chatId: readString(env, "TELEGRAM_CHAT_ID"),
      parseMode: readParseMode(env),
    },
    email: {
      enabled: readBoolean(env, "EMAIL_ENABLED", false),
      smtpHost: readString(env, "EMAIL_SMTP_HOST"),
      smtpPort: readNumber(env, "EMAIL_SMTP_PORT", 587),
      smtpUser: readString(env, "EMAIL_SMTP_USER"),
      smtpPassword: readString(env, "EMAIL_SMTP_PASSWORD"),
      from: readString(env, "EMAIL_FROM"),
      to: readString(env, "EMAIL_TO")
        .split(",")
        .map((addr) => addr.trim())
        .filter((addr) => addr !== ""),
      useTls: readBoolean(env, "EMAIL_USE_TLS", true),
      useSsl: readBoolean(env, "EMAIL_USE_SSL", false),
      subjectPrefix: readString(env, "EMAIL_SUBJECT_PREFIX", `[${APP_NAME}]`),
    },
    updates: {
      enabled: readBoolean(env, "UPDATE_CHECK_ENABLED", true),
      intervalSeconds: readNumber(env, "UPDATE_CHECK_INTERVAL", 86400),
      onStartup: readBoolean(env, "UPDATE_CHECK_ON_STARTUP", true),
      feedUrl: readString(env, "UPDATE_FEED_URL", DEFAULT_UPDATE_FEED_URL),
    },
    statusPort: statusPort > 0 ? statusPort : null,
    logFile: logFile ? resolvePath(logFile) : null,
    verbose: readBoolean(env, "VERBOSE", false),
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
