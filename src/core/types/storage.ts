/**
 * Blob storage configuration types.
 */

export type StorageAuth =
  | { method: "sharedKey"; accountKey: string }
  | { method: "sasToken"; sasToken: string }
  | { method: "clientCredential"; tenantId: string; clientId: string; clientSecret: string };

/**
 * A reusable, named set of credentials and destination parameters.
 */
export interface NamedStorageConfiguration {
  name: string;
  accountName: string;
  containerName: string;
  description?: string;
  /** Overrides https://<account>.blob.core.windows.net */
  endpoint?: string;
  auth: StorageAuth;
}

/**
 * Result of delivering a report file.
 */
export interface UploadResult {
  blobName: string;
  fileName: string;
  downloadLink?: string;
  linkExpiresAt?: Date;
}
