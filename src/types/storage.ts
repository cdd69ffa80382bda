/**
 * Object store interface definitions
 */

import type { Readable } from "node:stream";
import type { BackupRecord } from "./backup";

export interface StoreCallOptions {
  signal?: AbortSignal;
}

export interface PutOptions extends StoreCallOptions {
  contentLength: number;
  contentType?: string;
  metadata?: Record<string, string>;
}

export interface DeleteFailure {
  key: string;
  message: string;
}

/** Outcome of a batch delete; every requested key lands in exactly one list */
export interface DeleteManyResult {
  deleted: string[];
  failures: DeleteFailure[];
}

export interface ObjectStore {
  readonly bucket: string;
  readonly prefix: string;

  /**
   * Upload a whole object in one request; the key is not visible until it completes
   */
  put(key: string, body: Readable, options: PutOptions): Promise<BackupRecord>;

  get(key: string, options?: StoreCallOptions): Promise<Readable>;

  /**
   * List every archive record under a prefix, following pagination.
   * Keys that are not archive keys are dropped.
   */
  list(prefix: string, options?: StoreCallOptions): Promise<BackupRecord[]>;

  delete(key: string, options?: StoreCallOptions): Promise<void>;

  /**
   * Delete keys in batches. Rejects only when nothing was deleted; a later
   * failure is reported per key so earlier batches still count.
   */
  deleteMany(keys: string[], options?: StoreCallOptions): Promise<DeleteManyResult>;
}
