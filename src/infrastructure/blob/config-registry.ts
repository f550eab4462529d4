/**
 * Named storage configurations read from a JSON file.
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import type { IStorageConfigRegistry } from "../../core/interfaces/storage.js";
import type { NamedStorageConfiguration } from "../../core/types/storage.js";
import { isErrnoException } from "../../utils/guards.js";
import { errorMessage } from "../../core/errors.js";
import logger from "../../utils/logger.js";

export const StorageAuthSchema = z.discriminatedUnion("method", [
  z.object({ method: z.literal("sharedKey"), accountKey: z.string().min(1) }),
  z.object({ method: z.literal("sasToken"), sasToken: z.string().min(1) }),
  z.object({
    method: z.literal("clientCredential"),
    tenantId: z.string().min(1),
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
  }),
]);

export const NamedStorageConfigurationSchema = z.object({
  name: z.string().min(1),
  accountName: z.string().min(1),
  containerName: z.string().min(1),
  description: z.string().optional(),
  endpoint: z.string().url().optional(),
  auth: StorageAuthSchema,
});

export const StorageConfigsFileSchema = z.object({
  configurations: z.array(NamedStorageConfigurationSchema).default([]),
});

/**
 * Registry backed by storage-configs.json. The file is re-read on each lookup
 * so edits made by the front end apply to the next upload.
 */
export class FileStorageConfigRegistry implements IStorageConfigRegistry {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async get(name: string): Promise<NamedStorageConfiguration | undefined> {
    const configs = await this.load();
    return configs.find((c) => c.name === name);
  }

  async names(): Promise<string[]> {
    const configs = await this.load();
    return configs.map((c) => c.name);
  }

  private async load(): Promise<NamedStorageConfiguration[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      logger.error({ path: this.filePath, error: errorMessage(error) }, "Storage configurations file is not valid JSON");
      return [];
    }

    const result = StorageConfigsFileSchema.safeParse(raw);
    if (!result.success) {
      logger.error({ path: this.filePath, error: result.error.message }, "Invalid storage configurations file");
      return [];
    }
    return result.data.configurations;
  }
}
