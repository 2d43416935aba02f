import { Readable } from "node:stream";

import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";

import type { EffectiveConfig } from "../config/env.js";

export interface ObjectStoreClient {
  getObject(bucket: string, key: string): Promise<AsyncIterable<Uint8Array>>;
}

export interface ObjectStoreSettings {
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
}

export function objectStoreSettingsFromConfig(config: EffectiveConfig): ObjectStoreSettings | null {
  if (!config.R2_ENDPOINT || !config.R2_ACCESS_KEY_ID || !config.R2_SECRET_ACCESS_KEY) {
    return null;
  }
  return {
    endpoint: config.R2_ENDPOINT,
    region: config.R2_REGION,
    accessKeyId: config.R2_ACCESS_KEY_ID,
    secretAccessKey: config.R2_SECRET_ACCESS_KEY
  };
}

export class S3ObjectStoreClient implements ObjectStoreClient {
  private readonly client: S3Client;

  constructor(settings: ObjectStoreSettings) {
    this.client = new S3Client({
      region: settings.region,
      endpoint: settings.endpoint,
      forcePathStyle: true,
      credentials: {
        accessKeyId: settings.accessKeyId,
        secretAccessKey: settings.secretAccessKey
      }
    });
  }

  async getObject(bucket: string, key: string): Promise<AsyncIterable<Uint8Array>> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    const body = response.Body;
    if (!body) {
      throw new Error(`object ${bucket}/${key} has no body`);
    }
    if (!(body instanceof Readable)) {
      throw new Error(`object ${bucket}/${key} returned an unsupported body type`);
    }
    return body;
  }

  destroy(): void {
    this.client.destroy();
  }
}
