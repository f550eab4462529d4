/**
 * Azure Blob Storage client bound per call to a named configuration.
 */

import {
  BlobSASPermissions,
  BlobServiceClient,
  SASProtocol,
  StorageSharedKeyCredential,
  generateBlobSASQueryParameters,
} from "@azure/storage-blob";
import { ClientSecretCredential } from "@azure/identity";
import type { IBlobStorageClient } from "../../core/interfaces/storage.js";
import type { NamedStorageConfiguration } from "../../core/types/storage.js";

/**
 * Blob endpoint for a configuration.
 */
export function blobEndpoint(config: NamedStorageConfiguration): string {
  return (config.endpoint ?? `https://${config.accountName}.blob.core.windows.net`).replace(/\/+$/, "");
}

function serviceClient(config: NamedStorageConfiguration): BlobServiceClient {
  const endpoint = blobEndpoint(config);
  const auth = config.auth;

  switch (auth.method) {
    case "sharedKey":
      return new BlobServiceClient(endpoint, new StorageSharedKeyCredential(config.accountName, auth.accountKey));
    case "sasToken":
      return new BlobServiceClient(`${endpoint}?${auth.sasToken.replace(/^\?/, "")}`);
    case "clientCredential":
      return new BlobServiceClient(
        endpoint,
        new ClientSecretCredential(auth.tenantId, auth.clientId, auth.clientSecret),
      );
  }
}

export class AzureBlobStorageClient implements IBlobStorageClient {
  async upload(
    config: NamedStorageConfiguration,
    blobName: string,
    data: Buffer,
    contentType: string,
  ): Promise<void> {
    const blob = serviceClient(config).getContainerClient(config.containerName).getBlockBlobClient(blobName);
    await blob.uploadData(data, { blobHTTPHeaders: { blobContentType: contentType } });
  }

  /**
   * Read-only link: a service SAS for shared keys, the configured token for
   * SAS auth, a user-delegation SAS for client credentials.
   */
  async createDownloadLink(
    config: NamedStorageConfiguration,
    blobName: string,
    expiresOn: Date,
  ): Promise<string> {
    const service = serviceClient(config);
    const blob = service.getContainerClient(config.containerName).getBlobClient(blobName);
    const permissions = BlobSASPermissions.parse("r");

    switch (config.auth.method) {
      case "sharedKey":
        return blob.generateSasUrl({ permissions, expiresOn, protocol: SASProtocol.Https });
      case "sasToken":
        return blob.url;
      case "clientCredential": {
        const startsOn = new Date();
        const key = await service.getUserDelegationKey(startsOn, expiresOn);
        const sas = generateBlobSASQueryParameters(
          {
            containerName: config.containerName,
            blobName,
            permissions,
            startsOn,
            expiresOn,
            protocol: SASProtocol.Https,
          },
          key,
          config.accountName,
        );
        return `${blob.url}?${sas.toString()}`;
      }
    }
  }
}
