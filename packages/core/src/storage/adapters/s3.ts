/**
 * S3-compatible blob store. Uses ListObjectsV2 (paginated) and GetObject
 * against a single bucket; path-style addressing for non-AWS endpoints.
 */

import {
  GetObjectCommand,
  ListObjectsV2Command,
  S3Client,
} from "@aws-sdk/client-s3";
import type { StorageConfig } from "../../schemas/server-config.js";
import type { StorageCredentials } from "../../config/credentials.js";
import type { BlobObject, BlobStore } from "./interface.js";

export interface S3BlobStoreOptions {
  client: S3Client;
  bucket: string;
}

export function createS3Client(
  config: StorageConfig,
  credentials: StorageCredentials,
): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
    },
  });
}

export function createS3BlobStore(options: S3BlobStoreOptions): BlobStore {
  const { client, bucket } = options;

  return {
    async list(prefix) {
      const objects: BlobObject[] = [];
      let continuationToken: string | undefined;

      do {
        const page = await client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          }),
        );
        for (const item of page.Contents ?? []) {
          if (!item.Key) continue;
          objects.push({
            key: item.Key,
            size: item.Size ?? 0,
            lastModified: item.LastModified ?? new Date(0),
          });
        }
        continuationToken = page.IsTruncated
          ? page.NextContinuationToken
          : undefined;
      } while (continuationToken);

      return objects;
    },

    async get(key) {
      const res = await client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key }),
      );
      if (!res.Body) {
        throw new Error(`Object has no body: ${key}`);
      }
      return res.Body.transformToByteArray();
    },
  };
}
