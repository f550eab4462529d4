/**
 * File-backed report store: one JSON document per report plus index.json.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from "fs/promises";
import { basename, join } from "path";
import { randomUUID } from "crypto";
import type { IReportStore } from "../../core/interfaces/report-store.js";
import type {
  LoadedReports,
  ReportIndex,
  ReportIndexEntry,
  ScheduledReport,
} from "../../core/types/report.js";
import {
  ReportDefinitionError,
  ReportStoreUnavailableError,
  errorMessage,
} from "../../core/errors.js";
import { isErrnoException } from "../../utils/guards.js";
import { parseIndex, parseReport, serializeReport } from "./report-schema.js";
import logger from "../../utils/logger.js";

export const INDEX_FILE_NAME = "index.json";

const DEFINITION_FILE_PATTERN = /^[A-Za-z0-9._-]+\.json$/;

/**
 * Definition file name for a report id.
 */
export function reportFileName(id: string): string {
  return `${id}.json`;
}

/**
 * Whether a name is acceptable as a definition file (not the index, no path parts).
 */
export function isDefinitionFileName(fileName: string): boolean {
  return (
    fileName !== INDEX_FILE_NAME &&
    basename(fileName) === fileName &&
    DEFINITION_FILE_PATTERN.test(fileName)
  );
}

function toIndexEntry(report: ScheduledReport): ReportIndexEntry {
  return {
    id: report.id,
    name: report.name,
    reportType: report.reportType,
    isEnabled: report.isEnabled,
    nextRun: report.nextRun,
    lastRun: report.lastRun,
  };
}

/**
 * Report store over a service-owned directory.
 *
 * Writes go through a temporary file and a rename so readers never observe a
 * partially written document. Mutations run one at a time, since each one
 * rewrites the shared index.
 */
export class FileReportStore implements IReportStore {
  private directory: string;
  private mutations: Promise<unknown> = Promise.resolve();

  constructor(directory: string) {
    this.directory = directory;
  }

  get path(): string {
    return this.directory;
  }

  async loadAll(): Promise<LoadedReports> {
    let entries: string[];
    try {
      await mkdir(this.directory, { recursive: true });
      entries = await readdir(this.directory);
    } catch (error) {
      throw new ReportStoreUnavailableError(
        `Cannot read report directory ${this.directory}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const reports: ScheduledReport[] = [];
    const skipped: LoadedReports["skipped"] = [];

    for (const fileName of entries.filter(isDefinitionFileName).sort()) {
      try {
        const text = await readFile(join(this.directory, fileName), "utf-8");
        reports.push(parseReport(text, fileName));
      } catch (error) {
        skipped.push({ fileName, reason: errorMessage(error) });
        logger.warn({ fileName, error: errorMessage(error) }, "Skipping unreadable report definition");
      }
    }

    reports.sort((a, b) => a.name.localeCompare(b.name, undefined, { sensitivity: "base" }));
    return { reports, skipped };
  }

  async get(id: string): Promise<ScheduledReport | undefined> {
    const fileName = reportFileName(id);
    if (!isDefinitionFileName(fileName)) {
      return undefined;
    }

    try {
      const text = await readFile(join(this.directory, fileName), "utf-8");
      return parseReport(text, fileName);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }

  async save(report: ScheduledReport): Promise<void> {
    return this.serialized(() => this.saveNow(report));
  }

  async delete(id: string): Promise<boolean> {
    return this.removeDefinition(reportFileName(id));
  }

  async writeDefinition(fileName: string, contents: Buffer): Promise<void> {
    return this.serialized(() => this.writeDefinitionNow(fileName, contents));
  }

  async removeDefinition(fileName: string): Promise<boolean> {
    return this.serialized(() => this.removeDefinitionNow(fileName));
  }

  async writeIndex(contents: Buffer): Promise<void> {
    return this.serialized(async () => {
      parseIndex(contents.toString("utf-8"), INDEX_FILE_NAME);
      await this.writeAtomic(INDEX_FILE_NAME, contents);
    });
  }

  async readIndex(): Promise<ReportIndex | undefined> {
    let text: string;
    try {
      text = await readFile(join(this.directory, INDEX_FILE_NAME), "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }

    try {
      return parseIndex(text, INDEX_FILE_NAME);
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Report index is malformed, it will be rebuilt");
      return undefined;
    }
  }

  private async saveNow(report: ScheduledReport): Promise<void> {
    const fileName = reportFileName(report.id);
    if (!isDefinitionFileName(fileName)) {
      throw new ReportDefinitionError(`Report id '${report.id}' cannot be used as a file name`);
    }

    await this.writeAtomic(fileName, serializeReport(report));
    await this.upsertIndexEntry(toIndexEntry(report));
  }

  private async writeDefinitionNow(fileName: string, contents: Buffer): Promise<void> {
    if (!isDefinitionFileName(fileName)) {
      throw new ReportDefinitionError(`Invalid report file name '${fileName}'`);
    }

    const report = parseReport(contents.toString("utf-8"), fileName);
    if (reportFileName(report.id) !== fileName) {
      throw new ReportDefinitionError(
        `File name '${fileName}' does not match report id '${report.id}'`,
      );
    }

    await this.writeAtomic(fileName, contents);
    await this.upsertIndexEntry(toIndexEntry(report));
  }

  private async removeDefinitionNow(fileName: string): Promise<boolean> {
    if (!isDefinitionFileName(fileName)) {
      throw new ReportDefinitionError(`Invalid report file name '${fileName}'`);
    }

    let existed = true;
    try {
      await unlink(join(this.directory, fileName));
    } catch (error) {
      if (!(isErrnoException(error) && error.code === "ENOENT")) {
        throw error;
      }
      existed = false;
    }

    await this.removeIndexEntry(fileName.slice(0, -".json".length));
    return existed;
  }

  /**
   * Queue `task` behind every mutation already started. Its failure reaches
   * the caller through the returned promise and does not stall the queue.
   */
  private serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = this.mutations.then(task);
    this.mutations = run.catch(() => undefined);
    return run;
  }

  private async upsertIndexEntry(entry: ReportIndexEntry): Promise<void> {
    const index = (await this.readIndex()) ?? { reports: [], lastUpdated: new Date() };
    const position = index.reports.findIndex((r) => r.id === entry.id);
    if (position === -1) {
      index.reports.push(entry);
    } else {
      index.reports[position] = entry;
    }
    await this.persistIndex(index);
  }

  private async removeIndexEntry(id: string): Promise<void> {
    const index = await this.readIndex();
    if (!index) {
      return;
    }
    const remaining = index.reports.filter((r) => r.id !== id);
    if (remaining.length === index.reports.length) {
      return;
    }
    await this.persistIndex({ reports: remaining, lastUpdated: index.lastUpdated });
  }

  private async persistIndex(index: ReportIndex): Promise<void> {
    const next: ReportIndex = { reports: index.reports, lastUpdated: new Date() };
    await this.writeAtomic(INDEX_FILE_NAME, `${JSON.stringify(next, null, 2)}\n`);
  }

  private async writeAtomic(fileName: string, contents: string | Buffer): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = join(this.directory, fileName);
    const temp = join(this.directory, `.${fileName}.${randomUUID()}.tmp`);
    await writeFile(temp, contents);
    try {
      await rename(temp, target);
    } catch (error) {
      await unlink(temp).catch((cleanupError: unknown) => {
        logger.warn({ error: errorMessage(cleanupError), temp }, "Failed to remove temporary file");
      });
      throw error;
    }
  }
}
