import { ChangeEvent } from "../models/address-data";
import {
  ChannelResults,
  ChannelSender,
  DeliveryOutcome,
  NotificationContext,
  UpdateInfo,
} from "../models/notification-data";
import { RetrySettings } from "../config";
import { logger } from "../utils/logger";
import { MonitorError, errorMessage } from "../utils/monitor-error";
import { Sleep, retryWithBackoff } from "./retry";

/**
 * Fans a notification out to every registered channel. Channels are tried one
 * after another, each under its own retry budget, and one channel running out
 * of attempts never stops the next from being tried.
 */
export class NotificationDispatcher {
  private readonly channels: ChannelSender[] = [];

  constructor(
    private readonly retry: RetrySettings,
    private readonly sleep?: Sleep
  ) {}

  register(channel: ChannelSender): void {
    if (this.channels.some((existing) => existing.name === channel.name)) {
      throw new MonitorError(
        "E_DUPLICATE_CHANNEL",
        `Channel "${channel.name}" is already registered`
      );
    }
    this.channels.push(channel);
    logger.debug(`Registered notification channel: ${channel.name}`);
  }

  get channelNames(): string[] {
    return this.channels.map((channel) => channel.name);
  }

  get size(): number {
    return this.channels.length;
  }

  async dispatch(
    event: ChangeEvent,
    serverName: string,
    version: string
  ): Promise<ChannelResults> {
    const context: NotificationContext = { serverName, version };
    return this.fanOut(`${event.kind} notification`, (channel) =>
      channel.sendChange(event, context)
    );
  }

  async dispatchUpdate(
    update: UpdateInfo,
    serverName: string,
    version: string
  ): Promise<ChannelResults> {
    const context: NotificationContext = { serverName, version };
    return this.fanOut(`update notification (v${update.latestVersion})`, (channel) =>
      channel.sendUpdate(update, context)
    );
  }

  /**
   * Single attempt per channel. Nothing escapes: this runs on paths that are
   * already handling a failure.
   */
  async dispatchError(message: string, serverName: string): Promise<void> {
    const context: NotificationContext = { serverName, version: "" };

    for (const channel of this.channels) {
      try {
        const delivered = await channel.sendError(message, context);
        if (!delivered) {
          logger.warn(`[${channel.name}] Error notification was not delivered`);
        }
      } catch (error) {
        logger.warn(
          `[${channel.name}] Error notification failed: ${errorMessage(error)}`
        );
      }
    }
  }

  private async fanOut(
    what: string,
    send: (channel: ChannelSender) => Promise<boolean>
  ): Promise<ChannelResults> {
    const results: ChannelResults = {};

    if (this.channels.length === 0) {
      logger.warn(`No notification channels registered, ${what} skipped`);
      return results;
    }

    for (const channel of this.channels) {
      const outcome = await this.deliver(channel, what, send);
      results[channel.name] = outcome.state === "delivered";
    }

    const delivered = Object.values(results).filter(Boolean).length;
    logger.info(
      `${what}: delivered to ${delivered}/${this.channels.length} channel(s)`
    );
    return results;
  }

  private async deliver(
    channel: ChannelSender,
    what: string,
    send: (channel: ChannelSender) => Promise<boolean>
  ): Promise<DeliveryOutcome> {
    let attempts = 0;
    logger.debug(`[${channel.name}] idle -> attempting (${what})`);

    const delivered = await retryWithBackoff(() => send(channel), {
      maxRetries: this.retry.maxRetries,
      baseDelayMs: this.retry.baseDelayMs,
      label: `[${channel.name}] ${what}`,
      sleep: this.sleep,
      onAttempt: (attempt) => {
        attempts = attempt;
      },
    });

    const outcome: DeliveryOutcome = {
      channel: channel.name,
      state: delivered ? "delivered" : "exhausted",
      attempts,
    };

    if (delivered) {
      logger.success(
        `[${channel.name}] attempting -> delivered after ${attempts} attempt(s)`
      );
    } else {
      logger.error(
        `[${channel.name}] attempting -> exhausted after ${attempts} attempt(s)`
      );
    }
    return outcome;
  }
}
