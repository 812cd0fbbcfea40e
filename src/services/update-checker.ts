import { z } from "zod";
import { UpdateInfo } from "../models/notification-data";
import { logger } from "../utils/logger";
import { MonitorError, errorMessage } from "../utils/monitor-error";
import { HttpClient } from "./http-client";
import { StateStore } from "./state-store";

export type VersionTriple = [number, number, number];

const releaseSchema = z.object({
  tag_name: z.string().min(1),
  html_url: z.string().default(""),
  name: z.string().nullable().optional(),
  body: z.string().nullable().optional(),
  published_at: z.string().nullable().optional(),
});

export type ReleaseDescriptor = z.infer<typeof releaseSchema>;

export interface UpdateCheckerOptions {
  feedUrl: string;
  currentVersion: string;
  timeoutMs: number;
}

/**
 * Decides whether a newer release should be announced. It never records
 * the announcement itself; the caller writes the mark once delivery worked.
 */
export class UpdateChecker {
  constructor(
    private readonly http: HttpClient,
    private readonly store: Pick<StateStore, "loadUpdateMark">,
    private readonly options: UpdateCheckerOptions
  ) {}

  /**
   * "v1.4.1-beta" -> [1, 4, 1]; anything unrecognisable is [0, 0, 0]
   */
  static parseVersion(version: string): VersionTriple {
    const match = /^v?(\d+)\.(\d+)\.(\d+)(?:[-+].*)?$/.exec(version.trim());
    if (!match) {
      return [0, 0, 0];
    }
    return [Number(match[1]), Number(match[2]), Number(match[3])];
  }

  /**
   * Compare major, then minor, then patch. Negative when a < b.
   */
  static compareVersions(a: string, b: string): number {
    const left = this.parseVersion(a);
    const right = this.parseVersion(b);

    for (let i = 0; i < 3; i++) {
      if (left[i] !== right[i]) {
        return left[i] - right[i];
      }
    }
    return 0;
  }

  async fetchLatestRelease(): Promise<ReleaseDescriptor> {
    let data: unknown;
    try {
      const response = await this.http.get(this.options.feedUrl, {
        timeoutMs: this.options.timeoutMs,
        headers: { Accept: "application/vnd.github+json" },
      });
      data = response.data;
    } catch (error) {
      throw new MonitorError(
        "E_UPDATE_FEED",
        `Failed to fetch ${this.options.feedUrl}: ${errorMessage(error)}`,
        true,
        error
      );
    }

    const parsed = releaseSchema.safeParse(data);
    if (!parsed.success) {
      throw new MonitorError(
        "E_UPDATE_FEED",
        `Unexpected release feed response: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join(", ")}`
      );
    }
    return parsed.data;
  }

  async check(): Promise<UpdateInfo | null> {
    let release: ReleaseDescriptor;
    try {
      release = await this.fetchLatestRelease();
    } catch (error) {
      logger.warn(`Update check skipped: ${errorMessage(error)}`);
      return null;
    }

    const latestVersion = release.tag_name.trim().replace(/^v/, "");
    const currentVersion = this.options.currentVersion.replace(/^v/, "");

    if (UpdateChecker.compareVersions(latestVersion, currentVersion) <= 0) {
      logger.debug(
        `Running the latest version (current v${currentVersion}, feed v${latestVersion})`
      );
      return null;
    }

    const mark = await this.store.loadUpdateMark();
    if (mark !== null && mark.replace(/^v/, "") === latestVersion) {
      logger.debug(`Update v${latestVersion} was already announced`);
      return null;
    }

    logger.info(`New version available: v${currentVersion} -> v${latestVersion}`);
    return {
      currentVersion,
      latestVersion,
      releaseName: release.name ?? `v${latestVersion}`,
      releaseUrl: release.html_url,
      releaseBody: release.body ?? "",
      publishedAt: release.published_at ?? null,
    };
  }
}
