/**
 * Blob storage interfaces.
 */

import type { NamedStorageConfiguration } from "../types/storage.js";

/**
 * Registry of named storage configurations.
 */
export interface IStorageConfigRegistry {
  /**
   * Resolve a configuration by name, or undefined when unknown.
   */
  get(name: string): Promise<NamedStorageConfiguration | undefined>;

  /**
   * Names of every configuration.
   */
  names(): Promise<string[]>;
}

/**
 * Low-level blob client bound to a configuration per call.
 */
export interface IBlobStorageClient {
  upload(
    config: NamedStorageConfiguration,
    blobName: string,
    data: Buffer,
    contentType: string,
  ): Promise<void>;

  createDownloadLink(
    config: NamedStorageConfiguration,
    blobName: string,
    expiresOn: Date,
  ): Promise<string>;
}
