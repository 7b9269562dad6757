import { readdir } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Logger } from "pino";
import { RelayError } from "../errors.js";

export interface AuthProfileRotationOptions {
  directory: string;
  logger: Logger;
  initialProfile?: string;
}

/**
 * Stored credential bundles, rotated on quota exhaustion or persistent
 * failure. Failed profiles stay excluded for the lifetime of the process.
 * Profiles are compared by file name so the same file reached through two
 * paths counts once.
 */
export class AuthProfileRotation {
  private readonly directory: string;
  private readonly logger: Logger;
  private readonly failed = new Set<string>();
  private current: string | null;

  public constructor(options: AuthProfileRotationOptions) {
    this.directory = options.directory;
    this.logger = options.logger;
    this.current = options.initialProfile || null;
  }

  public get currentProfile(): string | null {
    return this.current;
  }

  public get failedProfiles(): string[] {
    return [...this.failed];
  }

  public async listProfiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        this.logger.warn({ event: "auth_profiles_dir_missing", directory: this.directory }, "auth_profiles_dir_missing");
        return [];
      }
      throw error;
    }

    return entries
      .filter((entry) => entry.endsWith(".json"))
      .sort()
      .map((entry) => join(this.directory, entry));
  }

  public markFailed(profilePath: string | null = this.current): void {
    if (!profilePath) {
      this.logger.warn({ event: "auth_profile_mark_failed_skipped" }, "auth_profile_mark_failed_skipped");
      return;
    }
    this.failed.add(basename(profilePath));
    this.logger.warn({ event: "auth_profile_failed", profile: basename(profilePath) }, "auth_profile_failed");
  }

  /** Selects the first profile that is neither failed nor current. */
  public async next(): Promise<string> {
    const profiles = await this.listProfiles();
    const currentName = this.current ? basename(this.current) : null;
    const available = profiles.filter((profile) => {
      const name = basename(profile);
      return !this.failed.has(name) && name !== currentName;
    });

    const selected = available[0];
    if (!selected) {
      throw new RelayError(
        "recovery_exhausted",
        `All authentication profiles exhausted. Failed: ${this.failed.size}, Total: ${profiles.length}`,
        { failed: this.failedProfiles, total: profiles.length },
      );
    }

    this.current = selected;
    this.logger.info({ event: "auth_profile_selected", profile: basename(selected) }, "auth_profile_selected");
    return selected;
  }
}
