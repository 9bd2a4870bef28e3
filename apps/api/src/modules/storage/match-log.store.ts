/**
 * Match Log Store
 *
 * Persists match-log entries as one JSON array per UTC day
 * (`matches_YYYY-MM-DD.json`). An entry is logged once per day file,
 * keyed by match id.
 *
 * @module storage/match-log
 */

import { Injectable, Logger } from "@nestjs/common";
import * as path from "path";
import { MatchLogEntrySchema } from "@spike-stats/types";
import type { MatchLogEntry } from "@spike-stats/types";
import { AppConfigService } from "../../common/config";
import { SerialQueue, readJsonFile, writeJsonFile } from "./json-file";
import type { JsonReadResult } from "./json-file";

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class MatchLogStore {
  private readonly logger = new Logger(MatchLogStore.name);
  private readonly directory: string;
  private readonly writes = new SerialQueue();

  constructor(appConfig: AppConfigService) {
    this.directory = path.resolve(appConfig.matchLogsDir);
  }

  /**
   * Day file name of a moment, in UTC
   */
  static fileNameFor(date: Date): string {
    return `matches_${date.toISOString().slice(0, 10)}.json`;
  }

  /**
   * Append an entry to the day file of `now`
   *
   * @returns false when the match is already in that file
   */
  append(entry: MatchLogEntry, now: Date = new Date()): Promise<boolean> {
    return this.writes.run(async () => {
      const file = this.pathFor(now);
      const existing = await this.readRawEntries(file);

      const alreadyLogged = existing.some(
        (item) => typeof item === "object" && item !== null && "matchId" in item && item.matchId === entry.matchId,
      );
      if (alreadyLogged) {
        this.logger.log(`Match ${entry.matchId} already logged, skipping duplicate`);
        return false;
      }

      await writeJsonFile(file, [...existing, entry]);
      this.logger.log(`Logged match ${entry.matchId} to ${path.basename(file)}`);
      return true;
    });
  }

  /**
   * Entries of the last `days` day files, today included, most recent first
   *
   * Unreadable files and invalid entries are skipped with a warning. A match
   * logged on more than one day is returned once, from its latest day.
   */
  async readRecent(days: number, now: Date = new Date()): Promise<MatchLogEntry[]> {
    const entries: MatchLogEntry[] = [];
    const seen = new Set<string>();

    for (let offset = 0; offset < days; offset++) {
      const file = this.pathFor(new Date(now.getTime() - offset * DAY_MS));
      const dayEntries = await this.readValidEntries(file);

      // Day files are in append order
      for (const entry of dayEntries.reverse()) {
        if (seen.has(entry.matchId)) {
          this.logger.debug(`Ignoring repeat of match ${entry.matchId} in ${path.basename(file)}`);
          continue;
        }
        seen.add(entry.matchId);
        entries.push(entry);
      }
    }

    return entries;
  }

  /**
   * Find a logged match within the last `days` day files
   */
  async findMatch(
    matchId: string,
    days: number,
    now: Date = new Date(),
  ): Promise<MatchLogEntry | null> {
    const entries = await this.readRecent(days, now);
    return entries.find((entry) => entry.matchId === matchId) ?? null;
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  private pathFor(date: Date): string {
    return path.join(this.directory, MatchLogStore.fileNameFor(date));
  }

  /**
   * Day file contents as stored, without validation
   */
  private async readRawEntries(file: string): Promise<unknown[]> {
    const result = await readJsonFile(file);

    if (result.status === "missing") return [];
    if (result.status === "invalid") {
      this.logger.warn(`Match log ${path.basename(file)} is not valid JSON (${result.reason}); starting it over`);
      return [];
    }
    if (!Array.isArray(result.data)) {
      this.logger.warn(`Match log ${path.basename(file)} is not an array; starting it over`);
      return [];
    }
    return result.data;
  }

  private async readValidEntries(file: string): Promise<MatchLogEntry[]> {
    let result: JsonReadResult;
    try {
      result = await readJsonFile(file);
    } catch (error) {
      this.logger.warn(
        `Skipping unreadable match log ${path.basename(file)}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return [];
    }

    if (result.status === "missing") return [];
    if (result.status === "invalid" || !Array.isArray(result.data)) {
      this.logger.warn(`Skipping malformed match log ${path.basename(file)}`);
      return [];
    }

    const entries: MatchLogEntry[] = [];
    let skipped = 0;

    for (const item of result.data) {
      const parsed = MatchLogEntrySchema.safeParse(item);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} invalid entries in ${path.basename(file)}`);
    }

    return entries;
  }
}
