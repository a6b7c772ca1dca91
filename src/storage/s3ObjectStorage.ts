import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client
} from "@aws-sdk/client-s3";
import { ObjectStorage } from "./objectStorage";

export interface S3Location {
  bucket: string;
  key: string;
}

export function parseS3Url(url: string): S3Location {
  const match = url.match(/^s3:\/\/([^/]+)\/(.+)$/);
  if (!match) {
    throw new Error(`Not an s3:// object URL: ${url}`);
  }
  return { bucket: match[1], key: match[2] };
}

export async function readS3Object(client: S3Client, location: S3Location): Promise<Buffer> {
  const response = await client.send(new GetObjectCommand({ Bucket: location.bucket, Key: location.key }));
  if (!response.Body) {
    throw new Error(`Empty body for s3://${location.bucket}/${location.key}`);
  }
  return Buffer.from(await response.Body.transformToByteArray());
}

export class S3ObjectStorage implements ObjectStorage {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  async put(key: string, bytes: Buffer): Promise<void> {
    await this.client.send(new PutObjectCommand({ Bucket: this.bucket, Key: key, Body: bytes }));
  }

  async get(key: string): Promise<Buffer> {
    return readS3Object(this.client, { bucket: this.bucket, key });
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    const normalizedPrefix = prefix.endsWith("/") ? prefix : `${prefix}/`;
    let continuationToken: string | undefined;
    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: normalizedPrefix,
          ContinuationToken: continuationToken
        })
      );
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
    return keys.sort();
  }

  async remove(key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  locate(key: string): string {
    return `s3://${this.bucket}/${key}`;
  }
}
