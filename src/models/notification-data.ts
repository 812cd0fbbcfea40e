import { ChangeEvent } from "./address-data";

export interface NotificationContext {
  serverName: string;
  version: string;
}

/**
 * A release newer than the running version that has not been announced yet
 */
export interface UpdateInfo {
  currentVersion: string;
  latestVersion: string;
  releaseName: string;
  releaseUrl: string;
  releaseBody: string;
  publishedAt: string | null;
}

/**
 * Common contract of every notification transport. Each operation resolves to
 * `true` when the message was delivered; it may also reject, which the
 * dispatcher counts as a failed attempt.
 */
export interface ChannelSender {
  readonly name: string;
  sendChange(event: ChangeEvent, context: NotificationContext): Promise<boolean>;
  sendUpdate(update: UpdateInfo, context: NotificationContext): Promise<boolean>;
  sendError(message: string, context: NotificationContext): Promise<boolean>;
}

export type ChannelResults = Record<string, boolean>;

export type DeliveryState = "idle" | "attempting" | "delivered" | "exhausted";

export interface DeliveryOutcome {
  channel: string;
  state: Extract<DeliveryState, "delivered" | "exhausted">;
  attempts: number;
}
