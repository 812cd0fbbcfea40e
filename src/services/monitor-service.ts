import {
  ChangeEvent,
  ChangeKind,
  ResolvedAddresses,
} from "../models/address-data";
import { ChannelResults, UpdateInfo } from "../models/notification-data";
import { MonitorConfig } from "../config";
import { logger } from "../utils/logger";
import { MonitorError, errorMessage } from "../utils/monitor-error";
import { ChangeDetector } from "./change-detector";
import { NotificationDispatcher } from "./notification-dispatcher";
import { StateStore } from "./state-store";

export interface AddressSource {
  resolve(monitorIpv4: boolean, monitorIpv6: boolean): Promise<ResolvedAddresses>;
}

export interface ReleaseSource {
  check(): Promise<UpdateInfo | null>;
}

export type CycleOutcome = ChangeKind | "resolution_failed" | "persist_failed";

export interface CycleResult {
  outcome: CycleOutcome;
  event: ChangeEvent | null;
  results: ChannelResults;
  error: string | null;
  completedAt: string;
}

export interface MonitorStatus {
  running: boolean;
  startedAt: string | null;
  cycleCount: number;
  lastCycle: CycleResult | null;
  lastUpdateCheckAt: string | null;
  latestUpdate: UpdateInfo | null;
  channels: string[];
}

export interface MonitorDependencies {
  resolver: AddressSource;
  store: StateStore;
  dispatcher: NotificationDispatcher;
  updateChecker: ReleaseSource | null;
  now?: () => Date;
}

/**
 * Drives the check cycle: resolve, classify, notify, persist. One cycle at a
 * time; `stop()` takes effect between cycles.
 */
export class MonitorService {
  private readonly now: () => Date;
  private running = false;
  private startedAt: Date | null = null;
  private cycleCount = 0;
  private lastCycle: CycleResult | null = null;
  private lastUpdateCheckAt: Date | null = null;
  private latestUpdate: UpdateInfo | null = null;
  private wakeUp: (() => void) | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly config: MonitorConfig,
    private readonly deps: MonitorDependencies
  ) {
    if (!config.monitorIpv4 && !config.monitorIpv6) {
      throw new MonitorError(
        "E_CONFIG_INVALID",
        "At least one of IPv4 or IPv6 monitoring must be enabled"
      );
    }
    this.now = deps.now ?? (() => new Date());
  }

  async runCycle(): Promise<CycleResult> {
    const { serverName, version, monitorIpv4, monitorIpv6 } = this.config;
    this.cycleCount++;

    let resolved: ResolvedAddresses;
    try {
      resolved = await this.deps.resolver.resolve(monitorIpv4, monitorIpv6);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Address resolution failed: ${message}`);
      await this.deps.dispatcher.dispatchError(
        `Failed to retrieve IP address: ${message}`,
        serverName
      );
      return this.finish("resolution_failed", null, {}, message);
    }

    const previous = await this.deps.store.load();
    const event = ChangeDetector.buildEvent(
      resolved.addresses,
      previous,
      resolved.geo
    );

    let results: ChannelResults = {};
    if (event.kind === "unchanged") {
      logger.info(
        `No change detected (IPv4: ${event.current.ipv4 ?? "None"}, IPv6: ${
          event.current.ipv6 ?? "None"
        })`
      );
    } else {
      logger.info(`Change detected: ${event.kind}`);
      results = await this.deps.dispatcher.dispatch(event, serverName, version);
    }

    try {
      await this.deps.store.save(event.current);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(message);
      await this.deps.dispatcher.dispatchError(
        `Failed to save IP state: ${message}`,
        serverName
      );
      return this.finish("persist_failed", event, results, message);
    }

    return this.finish(event.kind, event, results, null);
  }

  isUpdateCheckDue(now: Date = this.now()): boolean {
    const updates = this.config.updates;
    if (!updates.enabled || !this.deps.updateChecker) {
      return false;
    }
    if (this.lastUpdateCheckAt === null) {
      return true;
    }
    return (
      now.getTime() - this.lastUpdateCheckAt.getTime() >=
      updates.intervalSeconds * 1000
    );
  }

  /**
   * Check for a release and announce it. The mark is written only when at
   * least one channel took the announcement.
   */
  async runUpdateCheck(): Promise<UpdateInfo | null> {
    const checker = this.deps.updateChecker;
    if (!checker) return null;

    this.lastUpdateCheckAt = this.now();
    const update = await checker.check();
    if (!update) return null;

    this.latestUpdate = update;
    const results = await this.deps.dispatcher.dispatchUpdate(
      update,
      this.config.serverName,
      this.config.version
    );

    if (Object.values(results).some(Boolean)) {
      try {
        await this.deps.store.saveUpdateMark(update.latestVersion);
        logger.info(`Recorded update notification for v${update.latestVersion}`);
      } catch (error) {
        logger.error(`Failed to record update notification: ${errorMessage(error)}`);
      }
    } else {
      logger.warn(
        `Update v${update.latestVersion} was not delivered to any channel, will retry on next check`
      );
    }
    return update;
  }

  /**
   * Run until {@link stop} is called. Resolves once the loop has ended.
   */
  async start(): Promise<void> {
    if (this.running) return;

    this.running = true;
    this.startedAt = this.now();
    logger.info(
      `Monitoring ${this.protocols()} every ${this.config.checkIntervalSeconds}s`
    );

    await this.guard(() => this.runCycle());

    const updates = this.config.updates;
    if (this.running && updates.enabled && updates.onStartup) {
      await this.guard(() => this.runUpdateCheck());
    } else if (updates.enabled) {
      this.lastUpdateCheckAt = this.now();
    }

    while (this.running) {
      await this.wait(this.config.checkIntervalSeconds * 1000);
      if (!this.running) break;

      if (this.isUpdateCheckDue()) {
        await this.guard(() => this.runUpdateCheck());
      }
      await this.guard(() => this.runCycle());
    }

    logger.info("Monitor stopped");
  }

  stop(): void {
    if (!this.running) return;

    logger.info("Stopping monitor...");
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.wakeUp?.();
    this.wakeUp = null;
  }

  getStatus(): MonitorStatus {
    return {
      running: this.running,
      startedAt: this.startedAt?.toISOString() ?? null,
      cycleCount: this.cycleCount,
      lastCycle: this.lastCycle,
      lastUpdateCheckAt: this.lastUpdateCheckAt?.toISOString() ?? null,
      latestUpdate: this.latestUpdate,
      channels: this.deps.dispatcher.channelNames,
    };
  }

  private finish(
    outcome: CycleOutcome,
    event: ChangeEvent | null,
    results: ChannelResults,
    error: string | null
  ): CycleResult {
    this.lastCycle = {
      outcome,
      event,
      results,
      error,
      completedAt: this.now().toISOString(),
    };
    return this.lastCycle;
  }

  /**
   * Keep the loop alive through anything a cycle did not handle itself
   */
  private async guard(task: () => Promise<unknown>): Promise<void> {
    try {
      await task();
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Unexpected error in monitor loop: ${message}`);
      await this.deps.dispatcher.dispatchError(
        `Unexpected error: ${message}`,
        this.config.serverName
      );
    }
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeUp = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wakeUp = null;
        resolve();
      }, ms);
    });
  }

  private protocols(): string {
    const enabled = [
      this.config.monitorIpv4 ? "IPv4" : null,
      this.config.monitorIpv6 ? "IPv6" : null,
    ].filter((name): name is string => name !== null);
    return enabled.join(" + ");
  }
}
