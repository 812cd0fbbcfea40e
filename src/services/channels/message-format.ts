import { AddressPair, ChangeEvent, GeoInfo } from "../../models/address-data";
import { ChangeDetector } from "../change-detector";

export const ALERT_TITLE = "🌐 WAN IP Monitor Alert";
export const MAX_ERROR_LENGTH = 1000;
export const CHANGELOG_SCAN_LINES = 8;
export const CHANGELOG_MAX_ITEMS = 5;
export const CHANGELOG_FALLBACK = "See release notes for details";

const FAMILY_LABELS: Record<keyof AddressPair, string> = {
  ipv4: "IPv4",
  ipv6: "IPv6",
};

export function changeTitle(event: ChangeEvent): string {
  return event.kind === "first_run"
    ? "✅ Initial IP Detection"
    : "🔄 IP Address Changed";
}

export interface ChangeLine {
  label: string;
  from: string;
  to: string;
}

/**
 * One entry per changed family; a missing address renders as "None"
 */
export function changeLines(event: ChangeEvent): ChangeLine[] {
  return ChangeDetector.changedFamilies(event).map((family) => ({
    label: FAMILY_LABELS[family],
    from: event.previous[family] ?? "None",
    to: event.current[family] ?? "None",
  }));
}

/**
 * "City, Region, Country" plus organisation and timezone lines, each with
 * its marker. Empty when there is nothing to show.
 */
export function locationLines(geo: GeoInfo | null): string[] {
  if (!geo) return [];

  const lines: string[] = [];
  const place = [geo.city, geo.region, geo.country].filter(
    (part): part is string => Boolean(part)
  );
  if (place.length > 0) lines.push(`🌍 ${place.join(", ")}`);
  if (geo.org) lines.push(`🏢 ${geo.org}`);
  if (geo.timezone) lines.push(`🕐 ${geo.timezone}`);
  return lines;
}

/**
 * Bullet points from the top of a release body, re-marked with "•"
 */
export function changelogItems(body: string): string[] {
  const items: string[] = [];

  for (const rawLine of body.split("\n").slice(0, CHANGELOG_SCAN_LINES)) {
    const line = rawLine.trim();
    if (!/^(- |\* |• )/.test(line)) continue;

    const cleaned = line.replace(/^[-*•\s]+/, "").trim();
    if (cleaned !== "" && !cleaned.startsWith("#")) {
      items.push(cleaned);
    }
  }
  return items.slice(0, CHANGELOG_MAX_ITEMS);
}

export function changelogPreview(body: string, indent = ""): string {
  const items = changelogItems(body);
  return items.length > 0
    ? items.map((item) => `${indent}• ${item}`).join("\n")
    : CHANGELOG_FALLBACK;
}

export function truncate(text: string, max = MAX_ERROR_LENGTH): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * e.g. "Monday, March 04, 2024 at 09:05:00"
 */
export function formatDetectedAt(date: Date): string {
  const day = date.toLocaleDateString("en-US", { weekday: "long" });
  const month = date.toLocaleDateString("en-US", { month: "long" });
  const pad = (n: number) => String(n).padStart(2, "0");

  return `${day}, ${month} ${pad(date.getDate())}, ${date.getFullYear()} at ${pad(
    date.getHours()
  )}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
