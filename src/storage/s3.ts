/**
 * S3 object store
 */

import {
  DeleteObjectCommand,
  DeleteObjectsCommand,
  type DeleteObjectsCommandOutput,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { Readable } from "node:stream";
import type {
  BackupRecord,
  DeleteManyResult,
  ObjectStore,
  PutOptions,
  S3Config,
  StoreCallOptions,
} from "../types";
import { scoped } from "../utils/logger";
import { decodeKey } from "../utils/naming";

const log = scoped("s3");

/** DeleteObjects accepts at most this many keys per request */
export const DELETE_BATCH_SIZE = 1000;

export class StorageConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StorageConnectionError";
  }
}

type Env = Record<string, string | undefined>;

export interface ConnectOptions {
  env?: Env;
  /** Pre-built client; skips credential resolution */
  client?: S3Client;
  signal?: AbortSignal;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function trimEtag(etag: string | undefined): string {
  return (etag ?? "").replace(/^"|"$/g, "");
}

export function createS3Client(config: S3Config, env: Env = process.env): S3Client {
  const accessKeyId = config.accessKeyId ?? env.S3_ACCESS_KEY_ID ?? env.AWS_ACCESS_KEY_ID;
  const secretAccessKey =
    config.secretAccessKey ?? env.S3_SECRET_ACCESS_KEY ?? env.AWS_SECRET_ACCESS_KEY;
  const region =
    config.region ?? env.S3_REGION ?? env.AWS_REGION ?? env.AWS_DEFAULT_REGION ?? "us-east-1";
  const endpoint =
    config.endpoint ?? env.S3_ENDPOINT ?? env.AWS_ENDPOINT_URL_S3 ?? env.AWS_ENDPOINT_URL;

  if (!accessKeyId || !secretAccessKey) {
    throw new StorageConnectionError(
      "S3 credentials not found. Set accessKeyId/secretAccessKey in config or AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY environment variables.",
    );
  }

  return new S3Client({
    region,
    endpoint: endpoint || undefined,
    credentials: { accessKeyId, secretAccessKey },
    // S3-compatible providers (MinIO, R2, B2) expect path-style URLs
    forcePathStyle: Boolean(endpoint),
  });
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    readonly bucket: string,
    readonly prefix: string,
  ) {}

  /**
   * Build a store and check the bucket so bad credentials or a missing bucket
   * fail before any archive work starts.
   */
  static async connect(config: S3Config, options: ConnectOptions = {}): Promise<S3ObjectStore> {
    const client = options.client ?? createS3Client(config, options.env);

    try {
      await client.send(new HeadBucketCommand({ Bucket: config.bucket }), {
        abortSignal: options.signal,
      });
    } catch (error) {
      throw new StorageConnectionError(
        `Cannot access bucket ${config.bucket}: ${errorMessage(error)}`,
      );
    }

    log.debug(`Connected to bucket ${config.bucket}`);
    return new S3ObjectStore(client, config.bucket, config.prefix);
  }

  private toRecord(key: string, sizeBytes: number, etag: string): BackupRecord | null {
    const decoded = decodeKey(key, this.prefix);
    if (!decoded) return null;
    return { ...decoded, key, sizeBytes, etag };
  }

  async put(key: string, body: Readable, options: PutOptions): Promise<BackupRecord> {
    const decoded = decodeKey(key, this.prefix);
    if (!decoded) {
      throw new Error(`Refusing to upload non-archive key: ${key}`);
    }

    log.debug(`Uploading to s3://${this.bucket}/${key}`);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentLength: options.contentLength,
        ContentType: options.contentType ?? "application/octet-stream",
        Metadata: options.metadata,
      }),
      { abortSignal: options.signal },
    );

    const head = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }), {
      abortSignal: options.signal,
    });

    log.info(`Uploaded to s3://${this.bucket}/${key}`);
    return {
      ...decoded,
      key,
      sizeBytes: head.ContentLength ?? options.contentLength,
      etag: trimEtag(head.ETag),
    };
  }

  async get(key: string, options: StoreCallOptions = {}): Promise<Readable> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      { abortSignal: options.signal },
    );

    const body = response.Body;
    if (!(body instanceof Readable)) {
      throw new Error(`Empty or unsupported response body for s3://${this.bucket}/${key}`);
    }
    return body;
  }

  async list(prefix: string, options: StoreCallOptions = {}): Promise<BackupRecord[]> {
    const records: BackupRecord[] = [];
    let continuationToken: string | undefined;
    let foreign = 0;

    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        }),
        { abortSignal: options.signal },
      );

      for (const object of page.Contents ?? []) {
        if (!object.Key) continue;
        const record = this.toRecord(object.Key, object.Size ?? 0, trimEtag(object.ETag));
        if (record) {
          records.push(record);
        } else {
          foreign++;
        }
      }

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    if (foreign > 0) {
      log.debug(`Ignored ${foreign} non-archive object(s) under ${prefix}`);
    }
    return records;
  }

  async delete(key: string, options: StoreCallOptions = {}): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }), {
      abortSignal: options.signal,
    });
    log.debug(`Deleted s3://${this.bucket}/${key}`);
  }

  async deleteMany(keys: string[], options: StoreCallOptions = {}): Promise<DeleteManyResult> {
    const result: DeleteManyResult = { deleted: [], failures: [] };

    for (let start = 0; start < keys.length; start += DELETE_BATCH_SIZE) {
      const batch = keys.slice(start, start + DELETE_BATCH_SIZE);

      let response: DeleteObjectsCommandOutput;
      try {
        response = await this.client.send(
          new DeleteObjectsCommand({
            Bucket: this.bucket,
            Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
          }),
          { abortSignal: options.signal },
        );
      } catch (error) {
        if (result.deleted.length === 0) throw error;
        const message = errorMessage(error);
        log.error(`Batch delete stopped after ${result.deleted.length} object(s): ${message}`);
        result.failures.push(...keys.slice(start).map((key) => ({ key, message })));
        return result;
      }

      const failed = new Map<string, string>();
      for (const e of response.Errors ?? []) {
        failed.set(e.Key ?? "", e.Message ?? e.Code ?? "unknown error");
      }
      for (const key of batch) {
        const message = failed.get(key);
        if (message === undefined) {
          result.deleted.push(key);
        } else {
          result.failures.push({ key, message });
        }
      }

      log.debug(`Deleted ${batch.length - failed.size} object(s) from ${this.bucket}`);
    }

    return result;
  }
}
