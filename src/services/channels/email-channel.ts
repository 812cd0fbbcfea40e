import nodemailer, { SendMailOptions } from "nodemailer";
import { ChangeEvent } from "../../models/address-data";
import {
  ChannelSender,
  NotificationContext,
  UpdateInfo,
} from "../../models/notification-data";
import { EmailSettings } from "../../config";
import { logger } from "../../utils/logger";
import {
  ALERT_TITLE,
  changeLines,
  changeTitle,
  changelogItems,
  CHANGELOG_FALLBACK,
  escapeHtml,
  formatDetectedAt,
  locationLines,
  truncate,
} from "./message-format";

/**
 * The part of a nodemailer transporter the channel uses
 */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export interface RenderedMail {
  subject: string;
  text: string;
  html: string;
}

/**
 * SMTP transport: STARTTLS when `useTls`, implicit TLS when `useSsl`.
 */
export function createMailTransport(
  settings: EmailSettings,
  timeoutMs: number
): MailTransport {
  return nodemailer.createTransport({
    host: settings.smtpHost,
    port: settings.smtpPort,
    secure: settings.useSsl,
    requireTLS: settings.useTls && !settings.useSsl,
    auth: settings.smtpUser
      ? { user: settings.smtpUser, pass: settings.smtpPassword }
      : undefined,
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs,
  });
}

export class EmailChannel implements ChannelSender {
  readonly name = "email";

  constructor(
    private readonly settings: EmailSettings,
    private readonly transport: MailTransport,
    private readonly now: () => Date = () => new Date()
  ) {}

  renderChange(event: ChangeEvent, context: NotificationContext): RenderedMail {
    const title = changeTitle(event);
    const changes = changeLines(event).map(
      (line) => `${line.label}: ${line.from} → ${line.to}`
    );
    const current = [
      event.current.ipv4 ? `Current IPv4: ${event.current.ipv4}` : null,
      event.current.ipv6 ? `Current IPv6: ${event.current.ipv6}` : null,
    ].filter((line): line is string => line !== null);
    const location = locationLines(event.geo);
    const footer = [
      `Detected At: ${formatDetectedAt(this.now())}`,
      `Version: v${context.version}`,
    ];

    const sections: Array<{ heading: string | null; lines: string[] }> = [
      { heading: null, lines: [`Server: ${context.serverName}`] },
      { heading: "Changes Detected", lines: changes },
      { heading: "Current Addresses", lines: current },
      { heading: "Location Information", lines: location },
      { heading: null, lines: footer },
    ];

    return {
      subject: `${this.settings.subjectPrefix} ${title.replace(/^\S+\s/, "")} - ${
        context.serverName
      }`,
      ...this.renderSections(`${ALERT_TITLE}: ${title}`, sections),
    };
  }

  renderUpdate(update: UpdateInfo, context: NotificationContext): RenderedMail {
    const items = changelogItems(update.releaseBody);

    return {
      subject: `${this.settings.subjectPrefix} Update Available: v${update.latestVersion}`,
      ...this.renderSections("🆕 Update Available!", [
        {
          heading: null,
          lines: [
            `Current Version: v${update.currentVersion}`,
            `Latest Version: v${update.latestVersion}`,
          ],
        },
        {
          heading: "What's New",
          lines: items.length > 0 ? items.map((item) => `• ${item}`) : [CHANGELOG_FALLBACK],
        },
        { heading: "Full Changelog", lines: [update.releaseUrl] },
        { heading: null, lines: [`Update check for ${context.serverName}`] },
      ]),
    };
  }

  renderError(message: string, context: NotificationContext): RenderedMail {
    return {
      subject: `${this.settings.subjectPrefix} Monitor Error - ${context.serverName}`,
      ...this.renderSections("⚠️ WAN IP Monitor Error", [
        { heading: null, lines: [`Server: ${context.serverName}`] },
        { heading: "Details", lines: [truncate(message)] },
      ]),
    };
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

  private renderSections(
    title: string,
    sections: Array<{ heading: string | null; lines: string[] }>
  ): Pick<RenderedMail, "text" | "html"> {
    const visible = sections.filter((section) => section.lines.length > 0);

    const text = [
      title,
      "",
      ...visible.flatMap((section) => [
        ...(section.heading ? [`${section.heading}:`] : []),
        ...section.lines,
        "",
      ]),
    ]
      .join("\n")
      .trimEnd();

    const html = [
      `<h2>${escapeHtml(title)}</h2>`,
      ...visible.map(
        (section) =>
          (section.heading ? `<h3>${escapeHtml(section.heading)}</h3>` : "") +
          `<p>${section.lines.map(escapeHtml).join("<br>")}</p>`
      ),
    ].join("\n");

    return { text, html };
  }

  private async send(mail: RenderedMail, what: string): Promise<boolean> {
    await this.transport.sendMail({
      from: this.settings.from,
      to: this.settings.to.join(", "),
      subject: mail.subject,
      text: mail.text,
      html: mail.html,
    });
    logger.info(`Email ${what} sent to ${this.settings.to.length} recipient(s)`);
    return true;
  }
}
