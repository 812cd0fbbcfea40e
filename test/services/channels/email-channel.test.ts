import { SendMailOptions } from "nodemailer";
import { ChangeEvent } from "../../../src/models/address-data";
import { EmailSettings } from "../../../src/config";
import {
  EmailChannel,
  MailTransport,
} from "../../../src/services/channels/email-channel";

const NOW = new Date(2024, 2, 4, 9, 5, 0);
const CONTEXT = { serverName: "home-server", version: "1.4.1" };

const SETTINGS: EmailSettings = {
  enabled: true,
  smtpHost: "smtp.example.com",
  smtpPort: 587,
  smtpUser: "monitor@example.com",
  smtpPassword: "test-secret",
  from: "monitor@example.com",
  to: ["ops@example.com", "admin@example.com"],
  useTls: true,
  useSsl: false,
  subjectPrefix: "[wan-sentinel]",
};

class RecordingTransport implements MailTransport {
  readonly sent: SendMailOptions[] = [];
  failWith: Error | null = null;

  async sendMail(options: SendMailOptions): Promise<unknown> {
    if (this.failWith) throw this.failWith;
    this.sent.push(options);
    return { messageId: "<test@example.com>" };
  }
}

describe("EmailChannel", () => {
  let transport: RecordingTransport;
  let channel: EmailChannel;

  beforeEach(() => {
    transport = new RecordingTransport();
    channel = new EmailChannel(SETTINGS, transport, () => NOW);
  });

  test("should render a first-run message as text and HTML", () => {
    const event: ChangeEvent = {
      kind: "first_run",
      current: { ipv4: "203.0.113.5", ipv6: null },
      previous: { ipv4: null, ipv6: null },
      geo: null,
    };

    const mail = channel.renderChange(event, CONTEXT);

    expect(mail.subject).toBe("[wan-sentinel] Initial IP Detection - home-server");
    expect(mail.text).toBe(
      [
        "🌐 WAN IP Monitor Alert: ✅ Initial IP Detection",
        "",
        "Server: home-server",
        "",
        "Current Addresses:",
        "Current IPv4: 203.0.113.5",
        "",
        "Detected At: Monday, March 04, 2024 at 09:05:00",
        "Version: v1.4.1",
      ].join("\n")
    );
    expect(mail.html).toBe(
      [
        "<h2>🌐 WAN IP Monitor Alert: ✅ Initial IP Detection</h2>",
        "<p>Server: home-server</p>",
        "<h3>Current Addresses</h3><p>Current IPv4: 203.0.113.5</p>",
        "<p>Detected At: Monday, March 04, 2024 at 09:05:00<br>Version: v1.4.1</p>",
      ].join("\n")
    );
  });

  test("should list changes in the message", () => {
    const mail = channel.renderChange(
      {
        kind: "ipv4_changed",
        current: { ipv4: "2.2.2.2", ipv6: null },
        previous: { ipv4: "1.1.1.1", ipv6: null },
        geo: null,
      },
      CONTEXT
    );

    expect(mail.subject).toBe("[wan-sentinel] IP Address Changed - home-server");
    expect(mail.text).toContain("Changes Detected:\nIPv4: 1.1.1.1 → 2.2.2.2\n");
  });

  test("should send to every recipient", async () => {
    const delivered = await channel.sendError("lookup failed", CONTEXT);

    expect(delivered).toBe(true);
    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0]).toMatchObject({
      from: "monitor@example.com",
      to: "ops@example.com, admin@example.com",
      subject: "[wan-sentinel] Monitor Error - home-server",
    });
  });

  test("should render update notices", () => {
    const mail = channel.renderUpdate(
      {
        currentVersion: "1.4.0",
        latestVersion: "1.4.1",
        releaseName: "v1.4.1",
        releaseUrl: "https://example.com/releases/v1.4.1",
        releaseBody: "",
        publishedAt: null,
      },
      CONTEXT
    );

    expect(mail.subject).toBe("[wan-sentinel] Update Available: v1.4.1");
    expect(mail.text).toContain("What's New:\nSee release notes for details\n");
  });

  test("should propagate SMTP failures", async () => {
    transport.failWith = new Error("535 Authentication failed");

    await expect(channel.sendError("lookup failed", CONTEXT)).rejects.toThrow(
      "535 Authentication failed"
    );
  });
});
