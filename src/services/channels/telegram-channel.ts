import { ChangeEvent } from "../../models/address-data";
import {
  ChannelSender,
  NotificationContext,
  UpdateInfo,
} from "../../models/notification-data";
import { TelegramParseMode, TelegramSettings } from "../../config";
import { logger } from "../../utils/logger";
import { HttpClient } from "../http-client";
import {
  changeLines,
  changeTitle,
  changelogItems,
  CHANGELOG_FALLBACK,
  escapeHtml,
  formatDetectedAt,
  locationLines,
  truncate,
} from "./message-format";

export const TELEGRAM_API_BASE = "https://api.telegram.org";

interface Markup {
  text(value: string): string;
  bold(value: string): string;
  italic(value: string): string;
  code(value: string): string;
  link(label: string, url: string): string;
}

const MARKDOWN_V2_SPECIAL = /[_*[\]()~`>#+\-=|{}.!\\]/g;

const MARKUPS: Record<TelegramParseMode, Markup> = {
  HTML: {
    text: escapeHtml,
    bold: (v) => `<b>${escapeHtml(v)}</b>`,
    italic: (v) => `<i>${escapeHtml(v)}</i>`,
    code: (v) => `<code>${escapeHtml(v)}</code>`,
    link: (label, url) => `<a href="${escapeHtml(url)}">${escapeHtml(label)}</a>`,
  },
  Markdown: {
    text: (v) => v,
    bold: (v) => `*${v}*`,
    italic: (v) => `_${v}_`,
    code: (v) => `\`${v}\``,
    link: (label, url) => `[${label}](${url})`,
  },
  MarkdownV2: {
    text: (v) => v.replace(MARKDOWN_V2_SPECIAL, "\\$&"),
    bold: (v) => `*${v.replace(MARKDOWN_V2_SPECIAL, "\\$&")}*`,
    italic: (v) => `_${v.replace(MARKDOWN_V2_SPECIAL, "\\$&")}_`,
    code: (v) => `\`${v.replace(/[`\\]/g, "\\$&")}\``,
    link: (label, url) =>
      `[${label.replace(MARKDOWN_V2_SPECIAL, "\\$&")}](${url.replace(/[)\\]/g, "\\$&")})`,
  },
};

/**
 * Sends messages through the Bot API `sendMessage` method.
 */
export class TelegramChannel implements ChannelSender {
  readonly name = "telegram";
  private readonly markup: Markup;

  constructor(
    private readonly settings: TelegramSettings,
    private readonly botName: string,
    private readonly http: HttpClient,
    private readonly timeoutMs: number,
    private readonly now: () => Date = () => new Date()
  ) {
    this.markup = MARKUPS[settings.parseMode];
  }

  get apiUrl(): string {
    return `${TELEGRAM_API_BASE}/bot${this.settings.botToken}/sendMessage`;
  }

  renderChange(event: ChangeEvent, context: NotificationContext): string {
    const m = this.markup;
    const firstRun = event.kind === "first_run";
    const lines = [
      `${firstRun ? "🟢" : "🟠"} ${m.bold("WAN IP Monitor Alert")}`,
      m.bold(changeTitle(event)),
      `${m.text("Monitoring for ")}${m.bold(context.serverName)}`,
      "",
    ];

    if (!firstRun) {
      lines.push(m.bold("📊 Changes Detected:"));
      for (const change of changeLines(event)) {
        lines.push(
          `  • ${m.text(`${change.label}: `)}${m.code(change.from)} → ${m.code(change.to)}`
        );
      }
      lines.push("");
    }

    if (event.current.ipv4) {
      lines.push(m.bold("📍 Current IPv4:"), m.code(event.current.ipv4), "");
    }
    if (event.current.ipv6) {
      lines.push(m.bold("📍 Current IPv6:"), m.code(event.current.ipv6), "");
    }

    const location = locationLines(event.geo);
    if (location.length > 0) {
      lines.push(m.bold("📍 Location Information"), ...location.map(m.text), "");
    }

    lines.push(
      `${m.bold("⏰ Detected At:")} ${m.text(formatDetectedAt(this.now()))}`,
      `${m.bold("📦 Version:")} ${m.text(`v${context.version}`)}`
    );
    return lines.join("\n");
  }

  renderUpdate(update: UpdateInfo, context: NotificationContext): string {
    const m = this.markup;
    const items = changelogItems(update.releaseBody);
    const preview =
      items.length > 0
        ? items.map((item) => `  • ${m.text(item)}`)
        : [m.text(CHANGELOG_FALLBACK)];

    return [
      `🆕 ${m.bold(`${this.botName} Update Available!`)}`,
      "",
      `${m.bold("Current Version:")} ${m.text(`v${update.currentVersion}`)}`,
      `${m.bold("Latest Version:")} ${m.text(`v${update.latestVersion}`)}`,
      "",
      m.bold("📋 What's New:"),
      ...preview,
      "",
      m.bold("🔗 Full Changelog:"),
      m.link("View Release Notes", update.releaseUrl),
      "",
      m.italic(`Update check for ${context.serverName}`),
    ].join("\n");
  }

  renderError(message: string, context: NotificationContext): string {
    const m = this.markup;
    return [
      `⚠️ ${m.bold("WAN IP Monitor Error")}`,
      `${m.text("Server: ")}${m.bold(context.serverName)}`,
      "",
      m.code(truncate(message)),
    ].join("\n");
  }

  sendChange(event: ChangeEvent, context: NotificationContext): Promise<boolean> {
    return this.send(this.renderChange(event, context), "notification");
  }

  sendUpdate(update: UpdateInfo, context: NotificationContext): Promise<boolean> {
    return this.send(this.renderUpdate(update, context), "update notification");
  }

  sendError(message: string, context: NotificationContext): Promise<boolean> {
    return this.send(this.renderError(message, context), "error notification");
  }

  private async send(text: string, what: string): Promise<boolean> {
    const response = await this.http.post(
      this.apiUrl,
      {
        chat_id: this.settings.chatId,
        text,
        parse_mode: this.settings.parseMode,
        disable_web_page_preview: true,
      },
      { timeoutMs: this.timeoutMs }
    );

    if (response.status === 200 && isOk(response.data)) {
      logger.info(`Telegram ${what} sent successfully`);
      return true;
    }
    logger.error(`Telegram ${what} failed (Status: ${response.status})`);
    return false;
  }
}

function isOk(data: unknown): boolean {
  return (
    typeof data === "object" &&
    data !== null &&
    "ok" in data &&
    data.ok === true
  );
}
