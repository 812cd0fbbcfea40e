import { ChannelSender } from "../../models/notification-data";
import { MonitorConfig } from "../../config";
import { HttpClient } from "../http-client";
import { DiscordChannel } from "./discord-channel";
import { EmailChannel, MailTransport, createMailTransport } from "./email-channel";
import { TelegramChannel } from "./telegram-channel";

/**
 * Build the enabled channels, always in the order Discord, Telegram, Email.
 */
export function createChannels(
  config: MonitorConfig,
  http: HttpClient,
  mailTransport?: MailTransport
): ChannelSender[] {
  const channels: ChannelSender[] = [];

  if (config.discord.enabled) {
    channels.push(
      new DiscordChannel(config.discord, config.botName, http, config.requestTimeoutMs)
    );
  }

  if (config.telegram.enabled) {
    channels.push(
      new TelegramChannel(config.telegram, config.botName, http, config.requestTimeoutMs)
    );
  }

  if (config.email.enabled) {
    channels.push(
      new EmailChannel(
        config.email,
        mailTransport ?? createMailTransport(config.email, config.requestTimeoutMs)
      )
    );
  }

  return channels;
}
