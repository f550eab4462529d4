/**
 * Blob storage infrastructure exports.
 */

export { AzureBlobStorageClient, blobEndpoint } from "./azure-blob-client.js";
export {
  FileStorageConfigRegistry,
  NamedStorageConfigurationSchema,
  StorageAuthSchema,
  StorageConfigsFileSchema,
} from "./config-registry.js";
