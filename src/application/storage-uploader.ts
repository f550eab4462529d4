/**
 * Delivery of extracted reports to named blob storage destinations.
 */

import { extname } from "path";
import type { IBlobStorageClient, IStorageConfigRegistry } from "../core/interfaces/storage.js";
import type { ScheduledReport } from "../core/types/report.js";
import type { NamedStorageConfiguration, UploadResult } from "../core/types/storage.js";
import { StorageConfigurationError, StorageTransportError, errorMessage } from "../core/errors.js";
import { formatDate, formatTime } from "../utils/time.js";
import { renderTemplate } from "../utils/template.js";
import logger from "../utils/logger.js";

/** Default link lifetime: 7 days */
export const DEFAULT_LINK_EXPIRATION_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

const CONTENT_TYPES: Record<string, string> = {
  csv: "text/csv",
  json: "application/json",
};

export interface UploadContext {
  jobId?: string;
  now: Date;
}

/**
 * Blob name for a report file: rendered folder path plus rendered file name.
 */
export function buildBlobName(
  report: ScheduledReport,
  extension: string,
  context: UploadContext,
  timeZone: string,
): { blobName: string; fileName: string } {
  const values: Record<string, string> = {
    reportName: report.name.replace(/\s+/g, ""),
    reportType: report.reportType,
    date: formatDate(context.now, timeZone),
    time: formatTime(context.now, timeZone),
    jobId: context.jobId ?? "",
    extension,
  };

  const fileName = renderTemplate(report.delivery.fileNameTemplate, values);
  let folder = renderTemplate(report.delivery.folderPath, {
    ...values,
    reportType: report.reportType.toLowerCase(),
  }).replace(/^\/+/, "");
  if (folder !== "" && !folder.endsWith("/")) {
    folder += "/";
  }

  return { blobName: `${folder}${fileName}`, fileName };
}

/**
 * When the link will stop working. A SAS-token configuration links with its
 * own token, so the token's `se` field decides; a token without one yields
 * no expiry.
 */
function linkExpiry(config: NamedStorageConfiguration, requested: Date): Date | undefined {
  if (config.auth.method !== "sasToken") {
    return requested;
  }
  const signedExpiry = new URLSearchParams(config.auth.sasToken.replace(/^\?/, "")).get("se");
  if (!signedExpiry) {
    return undefined;
  }
  const expiresAt = new Date(signedExpiry);
  return Number.isNaN(expiresAt.getTime()) ? undefined : expiresAt;
}

/**
 * Uploads report payloads and optionally produces a read-only download link.
 */
export class StorageUploader {
  private registry: IStorageConfigRegistry;
  private client: IBlobStorageClient;
  private timeZone: string;

  constructor(options: {
    registry: IStorageConfigRegistry;
    client: IBlobStorageClient;
    timeZone?: string;
  }) {
    this.registry = options.registry;
    this.client = options.client;
    this.timeZone = options.timeZone ?? "UTC";
  }

  async upload(
    report: ScheduledReport,
    payload: { data: Buffer; fileName: string },
    context: UploadContext,
  ): Promise<UploadResult> {
    const configName = report.delivery.storageConfigName;
    const config = await this.registry.get(configName);
    if (!config) {
      throw new StorageConfigurationError(configName);
    }

    const extension = extname(payload.fileName).slice(1).toLowerCase() || report.format;
    const { blobName, fileName } = buildBlobName(report, extension, context, this.timeZone);

    try {
      await this.client.upload(config, blobName, payload.data, CONTENT_TYPES[extension] ?? "application/octet-stream");
    } catch (error) {
      throw new StorageTransportError(
        `Upload of ${blobName} to ${config.accountName}/${config.containerName} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    logger.info(
      { reportId: report.id, storage: configName, blobName, bytes: payload.data.length },
      "Report uploaded",
    );

    const result: UploadResult = { blobName, fileName };
    if (!report.delivery.createShareableLink) {
      return result;
    }

    const days = report.delivery.linkExpirationDays ?? DEFAULT_LINK_EXPIRATION_DAYS;
    const expiresOn = new Date(context.now.getTime() + days * DAY_MS);
    try {
      result.downloadLink = await this.client.createDownloadLink(config, blobName, expiresOn);
      const linkExpiresAt = linkExpiry(config, expiresOn);
      if (linkExpiresAt) {
        result.linkExpiresAt = linkExpiresAt;
      }
    } catch (error) {
      logger.warn(
        { reportId: report.id, blobName, error: errorMessage(error) },
        "Failed to create download link",
      );
    }

    return result;
  }
}
