import { MonitorConfig } from "./config";
import { APP_NAME } from "./version";
import { AddressResolver } from "./services/address-resolver";
import { createChannels } from "./services/channels/channel-factory";
import { MailTransport } from "./services/channels/email-channel";
import { AxiosHttpClient, HttpClient } from "./services/http-client";
import { MonitorService } from "./services/monitor-service";
import { NotificationDispatcher } from "./services/notification-dispatcher";
import { RedisClient } from "./services/redis-client";
import { RedisStateStore } from "./services/redis-state-store";
import { FileStateStore, StateStore } from "./services/state-store";
import { UpdateChecker } from "./services/update-checker";

export interface StateBackendHandle {
  store: StateStore;
  close(): Promise<void>;
}

/**
 * Open the configured state backend. `close` releases the Redis connection
 * and is a no-op for files.
 */
export function createStateStore(config: MonitorConfig): StateBackendHandle {
  if (config.state.backend === "redis") {
    const redis = new RedisClient(config.state.redisUrl);
    return {
      store: new RedisStateStore(redis, config.state.redisKeyPrefix),
      close: () => redis.disconnect(),
    };
  }

  return {
    store: new FileStateStore({
      stateFile: config.state.ipStateFile,
      updateMarkFile: config.state.updateMarkFile,
    }),
    close: async () => undefined,
  };
}

export interface MonitorOverrides {
  http?: HttpClient;
  mailTransport?: MailTransport;
  state?: StateBackendHandle;
}

export interface Monitor {
  service: MonitorService;
  store: StateStore;
  dispatcher: NotificationDispatcher;
  close(): Promise<void>;
}

export function createMonitor(
  config: MonitorConfig,
  overrides: MonitorOverrides = {}
): Monitor {
  const http =
    overrides.http ?? new AxiosHttpClient(`${APP_NAME}/${config.version}`);
  const state = overrides.state ?? createStateStore(config);

  const dispatcher = new NotificationDispatcher(config.retry);
  for (const channel of createChannels(config, http, overrides.mailTransport)) {
    dispatcher.register(channel);
  }

  const resolver = new AddressResolver(http, {
    timeoutMs: config.requestTimeoutMs,
    ipinfoToken: config.ipinfoToken,
  });

  const updateChecker = config.updates.enabled
    ? new UpdateChecker(http, state.store, {
        feedUrl: config.updates.feedUrl,
        currentVersion: config.version,
        timeoutMs: config.requestTimeoutMs,
      })
    : null;

  const service = new MonitorService(config, {
    resolver,
    store: state.store,
    dispatcher,
    updateChecker,
  });

  return { service, store: state.store, dispatcher, close: state.close };
}
