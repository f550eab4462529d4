/**
 * Extraction of the report payload from an export archive.
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { extname, join } from "path";
import AdmZip from "adm-zip";
import type { ReportFormat } from "../core/types/report.js";
import { ExtractionError, errorMessage } from "../core/errors.js";
import logger from "../utils/logger.js";

export interface ExtractedReport {
  data: Buffer;
  fileName: string;
  /** True when the archive held no file of the requested format */
  usedFallback: boolean;
}

const PAYLOAD_EXTENSIONS = new Set(["csv", "json"]);

function extensionOf(fileName: string): string {
  return extname(fileName).slice(1).toLowerCase();
}

function openArchive(archivePath: string): { zip: AdmZip; entries: ReturnType<AdmZip["getEntries"]> } {
  try {
    const zip = new AdmZip(archivePath);
    return { zip, entries: zip.getEntries() };
  } catch (error) {
    throw new ExtractionError(`Export archive is unreadable: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Extract the archive into a private temporary directory and return the
 * payload matching `format`, falling back to the first csv or json entry.
 */
export async function extractReport(
  archive: Buffer,
  format: ReportFormat,
  options: { tempRoot?: string } = {},
): Promise<ExtractedReport> {
  const workDir = await mkdtemp(join(options.tempRoot ?? tmpdir(), "reportd-"));

  try {
    const archiveDir = join(workDir, "archive");
    const payloadDir = join(workDir, "payload");
    await mkdir(archiveDir);
    await mkdir(payloadDir);

    const archivePath = join(archiveDir, "export.zip");
    await writeFile(archivePath, archive);

    // Entries are flattened to their base names; the first entry with a given name wins.
    const { zip, entries } = openArchive(archivePath);
    const candidates: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory) continue;
      if (candidates.includes(entry.name)) {
        logger.warn({ entry: entry.entryName }, "Skipping archive entry with a duplicate file name");
        continue;
      }
      zip.extractEntryTo(entry, payloadDir, false, true);
      candidates.push(entry.name);
    }

    const exact = candidates.find((name) => extensionOf(name) === format);
    const chosen = exact ?? candidates.find((name) => PAYLOAD_EXTENSIONS.has(extensionOf(name)));

    if (!chosen) {
      throw new ExtractionError(`No ${format.toUpperCase()} file found in export archive`);
    }

    if (!exact) {
      logger.warn({ expected: format, fileName: chosen }, "Export archive has no file of the requested format, using fallback");
    }

    return {
      data: await readFile(join(payloadDir, chosen)),
      fileName: chosen,
      usedFallback: !exact,
    };
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

/**
 * Number of data records in an extracted payload.
 */
export function countRecords(data: Buffer, format: ReportFormat): number {
  const text = data.toString("utf-8");

  if (format === "csv") {
    const lines = text.split(/\r?\n/).filter((line) => line.trim() !== "");
    return Math.max(0, lines.length - 1);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return 0;
  }

  if (Array.isArray(parsed)) {
    return parsed.length;
  }
  if (typeof parsed === "object" && parsed !== null && "value" in parsed && Array.isArray(parsed.value)) {
    return parsed.value.length;
  }
  return 0;
}
