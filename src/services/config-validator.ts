import { z } from "zod";
import { Env } from "../config";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const booleanSchema = z.enum(["true", "false"]);
const urlSchema = z.string().url().max(2048);
const emailSchema = z
  .string()
  .regex(/^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/);
const portSchema = z.coerce.number().int().min(1).max(65535);
const integerSchema = z.coerce.number().int();

const TELEGRAM_TOKEN = /^\d{8,10}:[A-Za-z0-9_-]{30,50}$/;
const DISCORD_WEBHOOK = /^https:\/\/(?:ptb\.|canary\.)?discord(?:app)?\.com\/api\/webhooks\//;

export const MIN_CHECK_INTERVAL = 60;
export const RECOMMENDED_CHECK_INTERVAL = 300;
export const MIN_UPDATE_CHECK_INTERVAL = 3600;

/**
 * Pre-flight gate over the raw environment. Collects every problem rather
 * than stopping at the first, so the operator can fix them in one pass.
 */
export class ConfigValidator {
  private readonly errors: string[] = [];
  private readonly warnings: string[] = [];

  private constructor(private readonly env: Env) {}

  static validate(env: Env = process.env): ValidationResult {
    const validator = new ConfigValidator(env);
    validator.run();
    return {
      valid: validator.errors.length === 0,
      errors: validator.errors,
      warnings: validator.warnings,
    };
  }

  private get(key: string, fallback = ""): string {
    return (this.env[key] ?? fallback).trim();
  }

  private run(): void {
    const discord = this.checkDiscord();
    const telegram = this.checkTelegram();
    const email = this.checkEmail();
    this.checkGeneral();
    this.checkUpdates();
    this.checkState();

    const enabled = ["DISCORD_ENABLED", "TELEGRAM_ENABLED", "EMAIL_ENABLED"].some(
      (key) => this.get(key, "false").toLowerCase() === "true"
    );
    if (!enabled) {
      this.errors.push(
        "No notification methods enabled - at least one must be configured"
      );
    }
    if (!discord && !telegram && !email) {
      this.errors.push(
        "No notification platforms properly configured - check your settings"
      );
    }
  }

  private checkBoolean(key: string, fallback: string): boolean | null {
    const value = this.get(key, fallback);
    const result = booleanSchema.safeParse(value.toLowerCase());
    if (!result.success) {
      this.errors.push(`${key}: Must be 'true' or 'false', got '${value}'`);
      return null;
    }
    return result.data === "true";
  }

  private checkUrl(value: string, key: string): boolean {
    if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
      this.errors.push(`${key}: Missing URL scheme (http:// or https://)`);
      return false;
    }
    if (!urlSchema.safeParse(value).success) {
      this.errors.push(`${key}: Invalid URL format '${value}'`);
      return false;
    }
    if (!/^https?:\/\//i.test(value)) {
      this.errors.push(`${key}: URL must use http or https`);
      return false;
    }
    if (!value.toLowerCase().startsWith("https://")) {
      this.warnings.push(`${key}: Using non-HTTPS URL is not recommended for security`);
    }
    return true;
  }

  private checkInteger(key: string, fallback: string, min: number): number | null {
    const value = this.get(key, fallback);
    const result = integerSchema.safeParse(value);
    if (value === "" || !result.success) {
      this.errors.push(`${key}: Invalid interval '${value}'`);
      return null;
    }
    if (result.data < min) {
      this.errors.push(
        `${key}: Interval must be at least ${min} seconds, got ${result.data}`
      );
      return null;
    }
    return result.data;
  }

  private checkPort(key: string, fallback: string): boolean {
    const value = this.get(key, fallback);
    if (value === "" || !portSchema.safeParse(value).success) {
      this.errors.push(`${key}: Port must be an integer between 1 and 65535, got '${value}'`);
      return false;
    }
    return true;
  }

  /** Returns true when the channel is enabled and usable */
  private checkDiscord(): boolean {
    if (!this.checkBoolean("DISCORD_ENABLED", "false")) return false;

    const webhook = this.get("DISCORD_WEBHOOK_URL");
    if (webhook === "") {
      this.errors.push("DISCORD_ENABLED is true but DISCORD_WEBHOOK_URL is not set");
      return false;
    }
    if (!this.checkUrl(webhook, "DISCORD_WEBHOOK_URL")) return false;
    if (!DISCORD_WEBHOOK.test(webhook)) {
      this.warnings.push(
        "DISCORD_WEBHOOK_URL doesn't appear to be a Discord webhook URL"
      );
    }

    const avatar = this.get("DISCORD_AVATAR_URL");
    if (avatar !== "" && !this.checkUrl(avatar, "DISCORD_AVATAR_URL")) return false;
    return true;
  }

  private checkTelegram(): boolean {
    if (!this.checkBoolean("TELEGRAM_ENABLED", "false")) return false;

    const token = this.get("TELEGRAM_BOT_TOKEN");
    const chatId = this.get("TELEGRAM_CHAT_ID");
    let usable = true;

    if (token === "") {
      this.errors.push("TELEGRAM_ENABLED is true but TELEGRAM_BOT_TOKEN is not set");
      usable = false;
    } else if (!TELEGRAM_TOKEN.test(token)) {
      this.errors.push(
        "TELEGRAM_BOT_TOKEN: Invalid format (should be like 123456789:ABCdefGHI...)"
      );
      usable = false;
    }

    if (chatId === "") {
      this.errors.push("TELEGRAM_ENABLED is true but TELEGRAM_CHAT_ID is not set");
      usable = false;
    } else if (!/^(@\w+|-?\d+)$/.test(chatId)) {
      this.errors.push(
        "TELEGRAM_CHAT_ID: Must be numeric or start with @ for username"
      );
      usable = false;
    }

    const parseMode = this.get("TELEGRAM_PARSE_MODE", "HTML");
    if (!["HTML", "Markdown", "MarkdownV2"].includes(parseMode)) {
      this.warnings.push(
        `TELEGRAM_PARSE_MODE: Unknown mode '${parseMode}', falling back to HTML`
      );
    }
    return usable;
  }

  private checkEmail(): boolean {
    if (!this.checkBoolean("EMAIL_ENABLED", "false")) return false;

    const required = [
      "EMAIL_SMTP_HOST",
      "EMAIL_SMTP_USER",
      "EMAIL_SMTP_PASSWORD",
      "EMAIL_FROM",
      "EMAIL_TO",
    ];
    const missing = required.filter((key) => this.get(key) === "");
    if (missing.length > 0) {
      for (const key of missing) {
        this.errors.push(`EMAIL_ENABLED is true but ${key} is not set`);
      }
      return false;
    }

    let usable = this.checkPort("EMAIL_SMTP_PORT", "587");

    const from = this.get("EMAIL_FROM");
    if (!emailSchema.safeParse(from).success) {
      this.errors.push(`EMAIL_FROM: Invalid email format '${from}'`);
      usable = false;
    }
    for (const to of this.get("EMAIL_TO").split(",").map((addr) => addr.trim())) {
      if (!emailSchema.safeParse(to).success) {
        this.errors.push(`EMAIL_TO: Invalid email format '${to}'`);
        usable = false;
      }
    }

    const tls = this.checkBoolean("EMAIL_USE_TLS", "true");
    const ssl = this.checkBoolean("EMAIL_USE_SSL", "false");
    if (tls === null || ssl === null) {
      usable = false;
    } else if (tls && ssl) {
      this.errors.push("EMAIL_USE_TLS and EMAIL_USE_SSL cannot both be enabled");
      usable = false;
    }
    return usable;
  }

  private checkGeneral(): void {
    const interval = this.checkInteger("CHECK_INTERVAL", "900", MIN_CHECK_INTERVAL);
    if (interval !== null && interval < RECOMMENDED_CHECK_INTERVAL) {
      this.warnings.push(
        "CHECK_INTERVAL is less than 5 minutes - may cause excessive API calls"
      );
    }

    const ipv4 = this.checkBoolean("MONITOR_IPV4", "true");
    const ipv6 = this.checkBoolean("MONITOR_IPV6", "true");
    if (ipv4 === false && ipv6 === false) {
      this.errors.push(
        "Both MONITOR_IPV4 and MONITOR_IPV6 are disabled - at least one must be enabled"
      );
    }

    this.checkInteger("REQUEST_TIMEOUT", "10", 1);
    this.checkInteger("NOTIFY_MAX_RETRIES", "3", 1);
    this.checkInteger("NOTIFY_RETRY_BASE_DELAY", "2", 0);

    const statusPort = this.get("STATUS_PORT");
    if (statusPort !== "" && statusPort !== "0") {
      this.checkPort("STATUS_PORT", "");
    }
    this.checkBoolean("VERBOSE", "false");
  }

  private checkUpdates(): void {
    if (!this.checkBoolean("UPDATE_CHECK_ENABLED", "true")) return;

    this.checkInteger("UPDATE_CHECK_INTERVAL", "86400", MIN_UPDATE_CHECK_INTERVAL);
    this.checkBoolean("UPDATE_CHECK_ON_STARTUP", "true");

    const feed = this.get("UPDATE_FEED_URL");
    if (feed !== "") {
      this.checkUrl(feed, "UPDATE_FEED_URL");
    }
  }

  private checkState(): void {
    const backend = this.get("STATE_BACKEND", "file").toLowerCase();
    if (backend !== "file" && backend !== "redis") {
      this.errors.push(`STATE_BACKEND: Must be 'file' or 'redis', got '${backend}'`);
      return;
    }

    const redisUrl = this.get("REDIS_URL");
    if (backend === "redis" && redisUrl !== "" && !/^rediss?:\/\/.+/.test(redisUrl)) {
      this.errors.push(`REDIS_URL: Must start with redis:// or rediss://, got '${redisUrl}'`);
    }
  }
}
