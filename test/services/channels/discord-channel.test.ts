import { ChangeEvent } from "../../../src/models/address-data";
import {
  DISCORD_COLORS,
  DiscordChannel,
} from "../../../src/services/channels/discord-channel";
import { FakeHttpClient } from "../../fixtures/fake-http";

const WEBHOOK = "https://discord.com/api/webhooks/123/test-secret";
const NOW = new Date(2024, 2, 4, 9, 5, 0);
const CONTEXT = { serverName: "home-server", version: "1.4.1" };

const CHANGED: ChangeEvent = {
  kind: "ipv4_changed",
  current: { ipv4: "2.2.2.2", ipv6: "2001:4860::1" },
  previous: { ipv4: "1.1.1.1", ipv6: "2001:4860::1" },
  geo: {
    city: "Springfield",
    region: "Oregon",
    country: "US",
    org: null,
    timezone: "America/Los_Angeles",
  },
};

describe("DiscordChannel", () => {
  let http: FakeHttpClient;

  function channel(avatarUrl: string | null = null): DiscordChannel {
    return new DiscordChannel(
      { enabled: true, webhookUrl: WEBHOOK, avatarUrl },
      "wan-sentinel",
      http,
      5000,
      () => NOW
    );
  }

  beforeEach(() => {
    http = new FakeHttpClient();
  });

  test("should build a change embed", () => {
    expect(channel().buildChangePayload(CHANGED, CONTEXT)).toEqual({
      username: "wan-sentinel",
      embeds: [
        {
          title: "🌐 WAN IP Monitor Alert",
          description:
            "**🔄 IP Address Changed**\n\n**IPv4:** `1.1.1.1` → `2.2.2.2`",
          color: DISCORD_COLORS.changed,
          fields: [
            { name: "📍 Current IPv4", value: "`2.2.2.2`", inline: false },
            { name: "📍 Current IPv6", value: "`2001:4860::1`", inline: false },
            {
              name: "📍 Location Information",
              value: "🌍 Springfield, Oregon, US\n🕐 America/Los_Angeles",
              inline: false,
            },
            {
              name: "⏰ Detected At",
              value: "Monday, March 04, 2024 at 09:05:00",
              inline: false,
            },
            { name: "📦 Version", value: "v1.4.1", inline: true },
          ],
          footer: { text: "wan-sentinel v1.4.1 on home-server" },
          timestamp: NOW.toISOString(),
        },
      ],
    });
  });

  test("should announce the first run in green", () => {
    const embed = channel().buildChangePayload(
      { ...CHANGED, kind: "first_run", previous: { ipv4: null, ipv6: null }, geo: null },
      CONTEXT
    ).embeds[0];

    expect(embed.color).toBe(DISCORD_COLORS.firstRun);
    expect(embed.description).toBe(
      "**✅ Initial IP Detection**\n\nMonitoring started for **home-server**"
    );
  });

  test("should include the avatar only when configured", () => {
    const payload = channel("https://example.com/avatar.png").buildChangePayload(
      CHANGED,
      CONTEXT
    );

    expect(payload.avatar_url).toBe("https://example.com/avatar.png");
    expect(channel().buildChangePayload(CHANGED, CONTEXT)).not.toHaveProperty(
      "avatar_url"
    );
  });

  test("should build an update embed with a changelog preview", () => {
    const embed = channel().buildUpdatePayload(
      {
        currentVersion: "1.4.0",
        latestVersion: "1.4.1",
        releaseName: "v1.4.1",
        releaseUrl: "https://example.com/releases/v1.4.1",
        releaseBody: "- Faster lookups\n- Fewer retries",
        publishedAt: null,
      },
      CONTEXT
    ).embeds[0];

    expect(embed.color).toBe(DISCORD_COLORS.update);
    expect(embed.fields).toEqual([
      { name: "📦 Current Version", value: "`v1.4.0`", inline: true },
      { name: "🎁 Latest Version", value: "`v1.4.1`", inline: true },
      { name: "📋 What's New", value: "• Faster lookups\n• Fewer retries", inline: false },
      {
        name: "🔗 Full Changelog",
        value: "[View Release Notes](https://example.com/releases/v1.4.1)",
        inline: false,
      },
    ]);
  });

  test("should truncate error messages", () => {
    const embed = channel().buildErrorPayload("e".repeat(1200), CONTEXT).embeds[0];

    expect(embed.color).toBe(DISCORD_COLORS.error);
    expect(embed.description).toBe(`\`\`\`\n${"e".repeat(1000)}...\n\`\`\``);
  });

  test.each([200, 204])("should treat HTTP %d as delivered", async (status) => {
    http.reply(WEBHOOK, "", status);

    expect(await channel().sendChange(CHANGED, CONTEXT)).toBe(true);
    expect(http.requests[0]).toMatchObject({
      method: "POST",
      url: WEBHOOK,
      options: { timeoutMs: 5000 },
    });
  });

  test("should report other statuses as failures", async () => {
    http.reply(WEBHOOK, { message: "Unknown Webhook" }, 404);

    expect(await channel().sendError("boom", CONTEXT)).toBe(false);
  });

  test("should let transport errors propagate to the retry policy", async () => {
    http.fail(WEBHOOK);

    await expect(channel().sendChange(CHANGED, CONTEXT)).rejects.toThrow(
      "connect ECONNREFUSED"
    );
  });
});
