import path from "path";
import { DEFAULT_UPDATE_FEED_URL, loadConfig } from "../src/config";
import { APP_VERSION } from "../src/version";
import { VALID_ENV } from "./utils/test-config";

describe("loadConfig", () => {
  test("should apply defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.serverName).toBe("wan-sentinel");
    expect(config.version).toBe(APP_VERSION);
    expect(config.checkIntervalSeconds).toBe(900);
    expect(config.monitorIpv4).toBe(true);
    expect(config.monitorIpv6).toBe(true);
    expect(config.ipinfoToken).toBeNull();
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.retry).toEqual({ maxRetries: 3, baseDelayMs: 2000 });
    expect(config.state.backend).toBe("file");
    expect(config.state.ipStateFile).toBe(path.join(process.cwd(), "data/ipinfo.db"));
    expect(config.state.updateMarkFile).toBe(
      path.join(process.cwd(), "data/last_update_notified.txt")
    );
    expect(config.updates).toEqual({
      enabled: true,
      intervalSeconds: 86400,
      onStartup: true,
      feedUrl: DEFAULT_UPDATE_FEED_URL,
    });
    expect(config.discord.enabled).toBe(false);
    expect(config.telegram.parseMode).toBe("HTML");
    expect(config.email.smtpPort).toBe(587);
    expect(config.statusPort).toBeNull();
    expect(config.logFile).toBeNull();
  });

  test("should read channel settings", () => {
    const config = loadConfig(VALID_ENV);

    expect(config.discord).toEqual({
      enabled: true,
      webhookUrl: "https://discord.com/api/webhooks/123/test-secret",
      avatarUrl: null,
    });
    expect(config.telegram.chatId).toBe("-1001234567890");
    expect(config.email.to).toEqual(["ops@example.com", "admin@example.com"]);
    expect(config.email.useTls).toBe(true);
    expect(config.email.useSsl).toBe(false);
  });

  test("should convert seconds and keep absolute paths", () => {
    const config = loadConfig({
      REQUEST_TIMEOUT: "5",
      NOTIFY_RETRY_BASE_DELAY: "1",
      IP_DB_FILE: "/var/lib/monitor/state.json",
      STATE_BACKEND: "REDIS",
      STATUS_PORT: "8080",
    });

    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.retry.baseDelayMs).toBe(1000);
    expect(config.state.ipStateFile).toBe("/var/lib/monitor/state.json");
    expect(config.state.backend).toBe("redis");
    expect(config.statusPort).toBe(8080);
  });

  test("should fall back on unparsable values", () => {
    const config = loadConfig({
      CHECK_INTERVAL: "soon",
      MONITOR_IPV6: "maybe",
      TELEGRAM_PARSE_MODE: "BBCode",
    });

    expect(config.checkIntervalSeconds).toBe(900);
    expect(config.monitorIpv6).toBe(true);
    expect(config.telegram.parseMode).toBe("HTML");
  });

  test("should be immutable", () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
    expect(Object.isFrozen(config.email.to)).toBe(true);
  });
});
