/**
 * Directory tree <-> tar stream, optionally gzip-compressed
 */

import type { Stats } from "node:fs";
import { createWriteStream } from "node:fs";
import {
  type FileHandle,
  lstat,
  mkdir,
  open,
  readdir,
  readlink,
  realpath,
  stat,
  symlink,
  unlink,
} from "node:fs/promises";
import * as path from "node:path";
import { Readable, type Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGunzip, createGzip } from "node:zlib";
import * as tar from "tar-stream";
import type { ArchiveStats } from "../../types";
import { scoped } from "../../utils/logger";
import { isPathWithinDir } from "../../utils/path";
import { normalizeIncludeTerms, shouldEmit, shouldInclude } from "./include-filter";
import { createPermissionCapability, type PermissionCapability } from "./permissions";

const log = scoped("archive");

/** PAX extended-header record carrying the base64 permission descriptor */
export const ACL_PAX_KEY = "STOWAGE.acl";

const GZIP_MAGIC = [0x1f, 0x8b] as const;

const READ_CHUNK_SIZE = 64 * 1024;

export class ArchiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArchiveError";
  }
}

export interface ArchiveOptions {
  compression: boolean;
  preservePermissions: boolean;
  permissions?: PermissionCapability;
  signal?: AbortSignal;
}

export interface CreateArchiveOptions extends ArchiveOptions {
  includeFolders?: readonly string[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emptyStats(): ArchiveStats {
  return { filesProcessed: 0, totalBytes: 0, skipped: 0 };
}

function resolvePermissions(options: ArchiveOptions): PermissionCapability | null {
  if (!options.preservePermissions) return null;
  const permissions = options.permissions ?? createPermissionCapability();
  return permissions.supported ? permissions : null;
}

function writeVoidEntry(pack: tar.Pack, header: tar.Headers): Promise<void> {
  return new Promise((resolve, reject) => {
    pack.entry(header, (error) => (error ? reject(error) : resolve()));
  });
}

function writeStreamEntry(pack: tar.Pack, header: tar.Headers, source: Readable): Promise<void> {
  return new Promise((resolve, reject) => {
    const entry = pack.entry(header, (error) => (error ? reject(error) : resolve()));
    entry.once("error", reject);
    source.once("error", (error) => {
      entry.destroy(error);
      reject(error);
    });
    source.pipe(entry);
  });
}

interface WalkContext {
  pack: tar.Pack;
  includeFolders: string[];
  permissions: PermissionCapability | null;
  stats: ArchiveStats;
  signal?: AbortSignal;
}

async function readDescriptor(
  ctx: WalkContext,
  absolutePath: string,
): Promise<Record<string, string> | undefined> {
  if (!ctx.permissions) return undefined;
  try {
    const descriptor = await ctx.permissions.getPermissionDescriptor(absolutePath);
    return descriptor ? { [ACL_PAX_KEY]: descriptor.toString("base64") } : undefined;
  } catch (error) {
    log.warn(`Failed to read permissions for ${absolutePath}: ${errorMessage(error)}`);
    return undefined;
  }
}

function baseHeader(name: string, stats: Stats): tar.Headers {
  return {
    name,
    mode: stats.mode & 0o7777,
    mtime: stats.mtime,
    uid: stats.uid,
    gid: stats.gid,
  };
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Exactly `size` bytes of an open file. A file that shrank or failed to read
 * after its header was written is padded with zeros so the stream stays valid.
 */
async function* fileBody(
  handle: FileHandle,
  size: number,
  onShortRead: (bytesRead: number, cause: string) => void,
): AsyncGenerator<Buffer> {
  let offset = 0;
  while (offset < size) {
    const buffer = Buffer.alloc(Math.min(READ_CHUNK_SIZE, size - offset));
    let bytesRead: number;
    try {
      ({ bytesRead } = await handle.read(buffer, 0, buffer.length, offset));
    } catch (error) {
      onShortRead(offset, errorMessage(error));
      break;
    }
    if (bytesRead === 0) {
      onShortRead(offset, "file shrank while being read");
      break;
    }
    offset += bytesRead;
    yield buffer.subarray(0, bytesRead);
  }

  while (offset < size) {
    const padding = Math.min(READ_CHUNK_SIZE, size - offset);
    offset += padding;
    yield Buffer.alloc(padding);
  }
}

async function addFile(
  ctx: WalkContext,
  absolutePath: string,
  name: string,
  stats: Stats,
): Promise<void> {
  // Open before the header goes out so an unreadable file leaves no trace in the stream
  let handle: FileHandle;
  try {
    handle = await open(absolutePath, "r");
  } catch (error) {
    log.warn(`Failed to open file ${absolutePath}: ${errorMessage(error)}`);
    ctx.stats.skipped++;
    return;
  }

  let complete = true;
  try {
    const pax = await readDescriptor(ctx, absolutePath);
    const header: tar.Headers = { ...baseHeader(name, stats), type: "file", size: stats.size, pax };

    if (stats.size === 0) {
      await new Promise<void>((resolve, reject) => {
        ctx.pack.entry(header, Buffer.alloc(0), (error) => (error ? reject(error) : resolve()));
      });
    } else {
      const body = fileBody(handle, stats.size, (bytesRead, cause) => {
        complete = false;
        log.warn(
          `Short read of ${absolutePath} (${bytesRead} of ${stats.size} bytes, ${cause}), padded with zeros`,
        );
      });
      await writeStreamEntry(ctx.pack, header, Readable.from(body));
    }
  } finally {
    await handle.close();
  }

  if (!complete) {
    ctx.stats.skipped++;
    return;
  }

  ctx.stats.filesProcessed++;
  ctx.stats.totalBytes += stats.size;
  log.debug(`Added file: ${name} (${stats.size} bytes)`);
}

async function addSymlink(
  ctx: WalkContext,
  absolutePath: string,
  name: string,
  stats: Stats,
): Promise<void> {
  let linkname: string;
  try {
    linkname = await readlink(absolutePath);
  } catch (error) {
    log.warn(`Failed to read link ${absolutePath}: ${errorMessage(error)}`);
    ctx.stats.skipped++;
    return;
  }

  await writeVoidEntry(ctx.pack, { ...baseHeader(name, stats), type: "symlink", linkname });
  log.debug(`Added symlink: ${name} -> ${linkname}`);
}

async function walk(ctx: WalkContext, dir: string, relativeDir: string): Promise<void> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (relativeDir === ".") {
      throw new ArchiveError(`Cannot read archive root ${dir}: ${errorMessage(error)}`);
    }
    log.warn(`Failed to read directory ${dir}: ${errorMessage(error)}`);
    ctx.stats.skipped++;
    return;
  }

  for (const entryName of names) {
    ctx.signal?.throwIfAborted();

    const absolutePath = path.join(dir, entryName);
    const relativePath = relativeDir === "." ? entryName : `${relativeDir}/${entryName}`;

    if (!shouldInclude(relativePath, ctx.includeFolders)) continue;

    let stats: Stats;
    try {
      stats = await lstat(absolutePath);
    } catch (error) {
      log.warn(`Error accessing ${absolutePath}: ${errorMessage(error)}`);
      ctx.stats.skipped++;
      continue;
    }

    const emit = shouldEmit(relativePath, ctx.includeFolders);

    if (stats.isDirectory()) {
      if (emit) {
        const pax = await readDescriptor(ctx, absolutePath);
        await writeVoidEntry(ctx.pack, {
          ...baseHeader(relativePath, stats),
          type: "directory",
          pax,
        });
      }
      await walk(ctx, absolutePath, relativePath);
    } else if (!emit) {
      continue;
    } else if (stats.isFile()) {
      await addFile(ctx, absolutePath, relativePath, stats);
    } else if (stats.isSymbolicLink()) {
      await addSymlink(ctx, absolutePath, relativePath, stats);
    } else {
      log.warn(`Skipping unsupported file type: ${absolutePath}`);
      ctx.stats.skipped++;
    }
  }
}

/**
 * Write the tree under `rootPath` to `output` as a tar stream.
 * Entry names are relative to the root; the root itself is not an entry.
 */
export async function createArchive(
  output: Writable,
  rootPath: string,
  options: CreateArchiveOptions,
): Promise<ArchiveStats> {
  const root = path.resolve(rootPath);

  // `output` belongs to this call from here on; it is destroyed if nothing gets written
  let rootStats: Stats;
  try {
    rootStats = await stat(root);
  } catch (error) {
    output.destroy();
    throw new ArchiveError(`Cannot access archive root ${root}: ${errorMessage(error)}`);
  }
  if (!rootStats.isDirectory()) {
    output.destroy();
    throw new ArchiveError(`Archive root is not a directory: ${root}`);
  }

  const includeFolders = normalizeIncludeTerms(options.includeFolders ?? []);
  log.info(`Creating archive from ${root}`);
  if (includeFolders.length > 0) {
    log.info(`Including specific folders: ${includeFolders.join(", ")}`);
  }

  const pack = tar.pack();
  const ctx: WalkContext = {
    pack,
    includeFolders,
    permissions: resolvePermissions(options),
    stats: emptyStats(),
    signal: options.signal,
  };

  const written = options.compression
    ? pipeline(pack, createGzip(), output, { signal: options.signal })
    : pipeline(pack, output, { signal: options.signal });

  const walked = walk(ctx, root, ".").then(
    () => {
      pack.finalize();
    },
    (error: unknown) => {
      pack.destroy(toError(error));
      throw error;
    },
  );

  const [walkResult, writeResult] = await Promise.allSettled([walked, written]);
  if (walkResult.status === "rejected") throw walkResult.reason;
  if (writeResult.status === "rejected") throw writeResult.reason;

  log.info(
    `Archive created: ${ctx.stats.filesProcessed} files, ${ctx.stats.totalBytes} bytes` +
      (ctx.stats.skipped > 0 ? `, ${ctx.stats.skipped} skipped` : ""),
  );
  return ctx.stats;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk);
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new ArchiveError("Unexpected chunk type in archive stream");
}

/**
 * Read enough of `input` to tell whether it starts with the gzip magic bytes,
 * returning a stream that still yields every byte.
 */
async function sniffGzip(input: Readable): Promise<{ gzipped: boolean; stream: Readable }> {
  const iterator = input[Symbol.asyncIterator]();
  let head = Buffer.alloc(0);

  while (head.length < GZIP_MAGIC.length) {
    const next = await iterator.next();
    if (next.done) break;
    head = Buffer.concat([head, toBuffer(next.value)]);
  }

  const gzipped = head[0] === GZIP_MAGIC[0] && head[1] === GZIP_MAGIC[1];

  async function* replay(): AsyncGenerator<Buffer> {
    try {
      if (head.length > 0) yield head;
      for (;;) {
        const next = await iterator.next();
        if (next.done) return;
        yield toBuffer(next.value);
      }
    } finally {
      input.destroy();
    }
  }

  return { gzipped, stream: Readable.from(replay()) };
}

async function drain(stream: AsyncIterable<unknown>): Promise<void> {
  const iterator = stream[Symbol.asyncIterator]();
  while (!(await iterator.next()).done) {
    // discard
  }
}

interface ExtractContext {
  dest: string;
  /** `dest` with symlinks resolved */
  realDest: string;
  permissions: PermissionCapability | null;
  stats: ArchiveStats;
}

async function restoreDescriptor(
  ctx: ExtractContext,
  header: tar.Headers,
  target: string,
): Promise<void> {
  const encoded = header.pax?.[ACL_PAX_KEY];
  if (!ctx.permissions || !encoded) return;
  // ACL tools follow links
  if ((await lstat(target)).isSymbolicLink()) return;

  try {
    await ctx.permissions.setPermissionDescriptor(target, Buffer.from(encoded, "base64"));
    log.debug(`Restored permissions for ${header.name}`);
  } catch (error) {
    log.warn(`Failed to restore permissions for ${target}: ${errorMessage(error)}`);
  }
}

async function lexists(target: string): Promise<boolean> {
  try {
    await lstat(target);
    return true;
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) return false;
    throw error;
  }
}

/**
 * Whether `dir` stays inside the destination once symlinks already on disk
 * (including ones extracted earlier from this archive) are followed.
 */
async function resolvesInside(ctx: ExtractContext, dir: string): Promise<boolean> {
  let existing = dir;
  while (!(await lexists(existing))) {
    existing = path.dirname(existing);
  }

  let resolved: string;
  try {
    resolved = await realpath(existing);
  } catch (error) {
    log.debug(`Cannot resolve ${existing}: ${errorMessage(error)}`);
    return false;
  }
  return isPathWithinDir(resolved, ctx.realDest);
}

async function extractEntry(
  ctx: ExtractContext,
  header: tar.Headers,
  stream: Readable,
): Promise<void> {
  const name = header.name.replace(/\/+$/, "");
  if (name === "" || name === ".") {
    await drain(stream);
    return;
  }

  const target = path.resolve(ctx.dest, name);
  if (path.isAbsolute(name) || target === ctx.dest || !isPathWithinDir(target, ctx.dest)) {
    log.warn(`Skipping entry outside destination: ${header.name}`);
    ctx.stats.skipped++;
    await drain(stream);
    return;
  }

  if (!(await resolvesInside(ctx, path.dirname(target)))) {
    log.warn(`Skipping entry that resolves outside destination through a symlink: ${header.name}`);
    ctx.stats.skipped++;
    await drain(stream);
    return;
  }

  await mkdir(path.dirname(target), { recursive: true });

  const type = header.type ?? "file";
  switch (type) {
    case "directory":
      if (!(await resolvesInside(ctx, target))) {
        log.warn(`Skipping directory that resolves outside destination: ${header.name}`);
        ctx.stats.skipped++;
        await drain(stream);
        return;
      }
      await mkdir(target, { recursive: true, mode: header.mode ?? 0o755 });
      await drain(stream);
      break;

    case "file":
    case "contiguous-file":
      // Replace a link rather than write through it
      if ((await lexists(target)) && (await lstat(target)).isSymbolicLink()) {
        await unlink(target);
      }
      await pipeline(Readable.from(stream), createWriteStream(target, { mode: header.mode ?? 0o644 }));
      ctx.stats.filesProcessed++;
      ctx.stats.totalBytes += header.size ?? 0;
      log.debug(`Extracted file: ${name}`);
      break;

    case "symlink":
      await drain(stream);
      if (!header.linkname) {
        log.warn(`Skipping symlink without target: ${name}`);
        ctx.stats.skipped++;
        return;
      }
      try {
        await symlink(header.linkname, target);
      } catch (error) {
        log.warn(`Failed to create symlink ${target}: ${errorMessage(error)}`);
        ctx.stats.skipped++;
        return;
      }
      break;

    default:
      log.warn(`Unsupported entry type for ${name}: ${type}`);
      ctx.stats.skipped++;
      await drain(stream);
      return;
  }

  await restoreDescriptor(ctx, header, target);
}

/**
 * Recreate the entries of a tar stream under `destPath`
 */
export async function extractArchive(
  input: Readable,
  destPath: string,
  options: ArchiveOptions,
): Promise<ArchiveStats> {
  const dest = path.resolve(destPath);

  // The caller's stream is released on every failure, even one that leaves it stalled
  const release = (): void => {
    input.destroy();
  };
  options.signal?.addEventListener("abort", release, { once: true });

  try {
    await mkdir(dest, { recursive: true });

    log.info(`Extracting archive to ${dest}`);

    let source = input;
    let gunzip = false;
    if (options.compression) {
      const sniffed = await sniffGzip(input);
      source = sniffed.stream;
      gunzip = sniffed.gzipped;
      if (!gunzip) {
        log.warn("Archive is not gzip-compressed, reading as plain tar");
      }
    }

    const ctx: ExtractContext = {
      dest,
      realDest: await realpath(dest),
      permissions: resolvePermissions(options),
      stats: emptyStats(),
    };

    const extract = tar.extract();
    extract.on("entry", (header, stream, next) => {
      extractEntry(ctx, header, stream).then(
        () => next(),
        (error: unknown) => {
          release();
          extract.destroy(toError(error));
        },
      );
    });

    if (gunzip) {
      await pipeline(source, createGunzip(), extract, { signal: options.signal });
    } else {
      await pipeline(source, extract, { signal: options.signal });
    }

    log.info(`Archive extracted: ${ctx.stats.filesProcessed} files`);
    return ctx.stats;
  } catch (error) {
    release();
    throw error;
  } finally {
    options.signal?.removeEventListener("abort", release);
  }
}
