/**
 * Storage module exports
 */

export {
  type ConnectOptions,
  createS3Client,
  DELETE_BATCH_SIZE,
  S3ObjectStore,
  StorageConnectionError,
} from "./s3";
