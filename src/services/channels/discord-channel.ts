import { ChangeEvent } from "../../models/address-data";
import {
  ChannelSender,
  NotificationContext,
  UpdateInfo,
} from "../../models/notification-data";
import { DiscordSettings } from "../../config";
import { logger } from "../../utils/logger";
import { HttpClient } from "../http-client";
import {
  ALERT_TITLE,
  changeLines,
  changeTitle,
  changelogPreview,
  formatDetectedAt,
  locationLines,
  truncate,
} from "./message-format";

export const DISCORD_COLORS = {
  firstRun: 0x00ff00,
  changed: 0xff9900,
  update: 0x00d9ff,
  error: 0xff0000,
} as const;

export interface EmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  fields: EmbedField[];
  footer: { text: string };
  timestamp: string;
}

export interface DiscordPayload {
  username: string;
  avatar_url?: string;
  embeds: DiscordEmbed[];
}

/**
 * Posts a single embed per notification to a Discord webhook.
 * Discord answers 204 by default and 200 when `?wait=true` is used.
 */
export class DiscordChannel implements ChannelSender {
  readonly name = "discord";

  constructor(
    private readonly settings: DiscordSettings,
    private readonly botName: string,
    private readonly http: HttpClient,
    private readonly timeoutMs: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  buildChangePayload(
    event: ChangeEvent,
    context: NotificationContext
  ): DiscordPayload {
    const changes = changeLines(event).map(
      (line) => `**${line.label}:** \`${line.from}\` → \`${line.to}\``
    );
    const changeInfo =
      event.kind === "first_run"
        ? `Monitoring started for **${context.serverName}**`
        : changes.join("\n") || "IP information updated";

    const fields: EmbedField[] = [];
    if (event.current.ipv4) {
      fields.push(field("📍 Current IPv4", `\`${event.current.ipv4}\``));
    }
    if (event.current.ipv6) {
      fields.push(field("📍 Current IPv6", `\`${event.current.ipv6}\``));
    }

    const location = locationLines(event.geo);
    if (location.length > 0) {
      fields.push(field("📍 Location Information", location.join("\n")));
    }

    const now = this.now();
    fields.push(field("⏰ Detected At", formatDetectedAt(now)));
    fields.push(field("📦 Version", `v${context.version}`, true));

    return this.payload({
      title: ALERT_TITLE,
      description: `**${changeTitle(event)}**\n\n${changeInfo}`,
      color:
        event.kind === "first_run"
          ? DISCORD_COLORS.firstRun
          : DISCORD_COLORS.changed,
      fields,
      footer: { text: `${this.botName} v${context.version} on ${context.serverName}` },
      timestamp: now.toISOString(),
    });
  }

  buildUpdatePayload(
    update: UpdateInfo,
    context: NotificationContext
  ): DiscordPayload {
    return this.payload({
      title: `🆕 ${this.botName} Update Available!`,
      description: update.releaseName
        ? `**${update.releaseName}** is ready to install.`
        : "A new version is ready to install.",
      color: DISCORD_COLORS.update,
      fields: [
        field("📦 Current Version", `\`v${update.currentVersion}\``, true),
        field("🎁 Latest Version", `\`v${update.latestVersion}\``, true),
        field("📋 What's New", changelogPreview(update.releaseBody)),
        field("🔗 Full Changelog", `[View Release Notes](${update.releaseUrl})`),
      ],
      footer: { text: `Update check for ${context.serverName}` },
      timestamp: this.now().toISOString(),
    });
  }

  buildErrorPayload(message: string, context: NotificationContext): DiscordPayload {
    return this.payload({
      title: "⚠️ WAN IP Monitor Error",
      description: `\`\`\`\n${truncate(message)}\n\`\`\``,
      color: DISCORD_COLORS.error,
      fields: [],
      footer: { text: `${this.botName} on ${context.serverName}` },
      timestamp: this.now().toISOString(),
    });
  }

  sendChange(event: ChangeEvent, context: NotificationContext): Promise<boolean> {
    return this.post(this.buildChangePayload(event, context), "notification");
  }

  sendUpdate(update: UpdateInfo, context: NotificationContext): Promise<boolean> {
    return this.post(this.buildUpdatePayload(update, context), "update notification");
  }

  sendError(message: string, context: NotificationContext): Promise<boolean> {
    return this.post(this.buildErrorPayload(message, context), "error notification");
  }

  private payload(embed: DiscordEmbed): DiscordPayload {
    const payload: DiscordPayload = { username: this.botName, embeds: [embed] };
    if (this.settings.avatarUrl) {
      payload.avatar_url = this.settings.avatarUrl;
    }
    return payload;
  }

  private async post(payload: DiscordPayload, what: string): Promise<boolean> {
    const response = await this.http.post(this.settings.webhookUrl, payload, {
      timeoutMs: this.timeoutMs,
    });

    if (response.status === 200 || response.status === 204) {
      logger.info(`Discord ${what} sent successfully (Status: ${response.status})`);
      return true;
    }
    logger.error(`Discord ${what} failed (Status: ${response.status})`);
    return false;
  }
}

function field(name: string, value: string, inline = false): EmbedField {
  return { name, value, inline };
}
