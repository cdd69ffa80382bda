import { chmod, mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { gunzipSync } from "node:zlib";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { ConfigError } from "../../src/config/validator";
import { BackupEngine, summarizeBackup } from "../../src/core/backup/orchestrator";
import type { StowageConfig } from "../../src/types";
import { setLogLevel } from "../../src/utils/logger";
import { listEntries } from "../helpers/archive";
import { fixedClock, makeConfig, recordingNotifier } from "../helpers/config";
import { MemoryObjectStore } from "../helpers/memory-store";

const CLOCK = fixedClock("2024-03-01T02:05:09Z");

// chmod 000 does not deny reads to root, and is not honoured on Windows
const cannotDenyReads = process.platform === "win32" || process.getuid?.() === 0;

describe("BackupEngine", () => {
  let tempDir: string;
  let scratchDir: string;
  let config: StowageConfig;

  beforeAll(async () => {
    setLogLevel("error");
    tempDir = await mkdtemp(path.join(os.tmpdir(), "stowage-backup-test-"));
    scratchDir = path.join(tempDir, "scratch");

    await mkdir(path.join(tempDir, "data", "db"), { recursive: true });
    await mkdir(path.join(tempDir, "data", "cache"), { recursive: true });
    await mkdir(path.join(tempDir, "uploads"), { recursive: true });
    await writeFile(path.join(tempDir, "data", "db", "main.db"), "database");
    await writeFile(path.join(tempDir, "data", "cache", "tmp.bin"), "cache");
    await writeFile(path.join(tempDir, "uploads", "x.png"), "png");

    config = makeConfig({
      services: {
        api: {
          paths: {
            uploads: path.join(tempDir, "uploads"),
            data: path.join(tempDir, "data"),
          },
          includeFolders: { data: ["db"] },
        },
        web: { paths: { static: path.join(tempDir, "uploads") } },
      },
      backup: { preserveAcls: false, compression: true, minSize: 0, tempDir: scratchDir },
    });
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("archives and uploads every path of a service", async () => {
    const store = new MemoryObjectStore();
    const notifier = recordingNotifier();
    const engine = new BackupEngine(config, store, { notifier: notifier.sink, clock: CLOCK });

    const result = await engine.runService("api");

    expect(result.service).toBe("api");
    expect(result.error).toBeUndefined();
    expect(result.results.map((r) => [r.path, r.record?.key, r.error])).toEqual([
      ["data", "backups/api/data/20240301-020509.tar.gz", undefined],
      ["uploads", "backups/api/uploads/20240301-020509.tar.gz", undefined],
    ]);
    expect([...store.objects.keys()].sort()).toEqual([
      "backups/api/data/20240301-020509.tar.gz",
      "backups/api/uploads/20240301-020509.tar.gz",
    ]);
  });

  test("applies include folders when archiving", async () => {
    const store = new MemoryObjectStore();
    const engine = new BackupEngine(config, store, { clock: CLOCK });

    const result = await engine.runService("api", { paths: ["data"] });

    const archive = store.objects.get("backups/api/data/20240301-020509.tar.gz");
    expect(archive).toBeDefined();
    const names = (await listEntries(gunzipSync(archive ?? Buffer.alloc(0)))).map((h) => h.name);
    expect(names.sort()).toEqual(["db", "db/main.db"]);
    expect(result.results[0]?.filesCount).toBe(1);
    expect(result.results[0]?.archiveSize).toBe(archive?.length);
  });

  test("writes .tar keys when compression is off", async () => {
    const store = new MemoryObjectStore();
    const plain = makeConfig({
      ...config,
      backup: { ...config.backup, compression: false },
    });
    const engine = new BackupEngine(plain, store, { clock: CLOCK });

    const result = await engine.runService("web");

    expect(result.results[0]?.record?.key).toBe("backups/web/static/20240301-020509.tar");
    expect(result.results[0]?.record?.compressed).toBe(false);
  });

  test("sends one notification per path", async () => {
    const notifier = recordingNotifier();
    const engine = new BackupEngine(config, new MemoryObjectStore(), {
      notifier: notifier.sink,
      clock: CLOCK,
    });

    await engine.runService("api", { paths: ["uploads"] });

    const [sent] = notifier.sent();
    expect(notifier.sent()).toHaveLength(1);
    expect(sent?.kind).toBe("success");
    expect(sent?.subject).toBe("api");
    expect(sent?.operation).toBe("backup");
    expect(sent?.details.Path).toBe("uploads");
    expect(sent?.details["S3 Key"]).toBe("backups/api/uploads/20240301-020509.tar.gz");
    expect(sent?.details["Backup Time"]).toBe("2024-03-01 02:05:09");
  });

  test("a failing path does not stop its siblings", async () => {
    const broken = makeConfig({
      ...config,
      services: {
        api: {
          paths: {
            data: path.join(tempDir, "missing"),
            uploads: path.join(tempDir, "uploads"),
          },
        },
      },
    });
    const store = new MemoryObjectStore();
    const notifier = recordingNotifier();
    const engine = new BackupEngine(broken, store, { notifier: notifier.sink, clock: CLOCK });

    const result = await engine.runService("api");

    expect(result.results[0]?.error).toContain(
      `Cannot access archive root ${path.join(tempDir, "missing")}`,
    );
    expect(result.results[1]?.error).toBeUndefined();
    expect([...store.objects.keys()]).toEqual(["backups/api/uploads/20240301-020509.tar.gz"]);
    expect(notifier.sent().map((n) => n.kind)).toEqual(["error", "success"]);
    expect(summarizeBackup([result])).toEqual({ succeeded: 1, failed: 1 });
  });

  test("rejects archives below the minimum size without uploading", async () => {
    const strict = makeConfig({
      ...config,
      backup: { ...config.backup, minSize: 10_000_000 },
    });
    const store = new MemoryObjectStore();
    const engine = new BackupEngine(strict, store, { clock: CLOCK });

    const result = await engine.runService("web");

    expect(result.results[0]?.error).toMatch(
      /^Archive size \(\d+ bytes\) is below minimum threshold \(10000000 bytes\)$/,
    );
    expect(result.results[0]?.record).toBeUndefined();
    expect(store.objects.size).toBe(0);
  });

  test("records upload failures per path", async () => {
    const store = new MemoryObjectStore();
    store.failWith.put = (key) => (key.includes("/data/") ? new Error("Access Denied") : undefined);
    const engine = new BackupEngine(config, store, { clock: CLOCK });

    const result = await engine.runService("api");

    expect(result.results.map((r) => r.error)).toEqual(["Access Denied", undefined]);
  });

  test("skips unknown path names and fails when none remain", async () => {
    const engine = new BackupEngine(config, new MemoryObjectStore(), { clock: CLOCK });

    const result = await engine.runService("api", { paths: ["uploads", "logs"] });
    expect(result.results.map((r) => r.path)).toEqual(["uploads"]);

    await expect(engine.runService("api", { paths: ["logs"] })).rejects.toThrow(
      "No valid paths to back up for service api",
    );
  });

  test("raises an unknown service before touching the store", async () => {
    const store = new MemoryObjectStore();
    const engine = new BackupEngine(config, store, { clock: CLOCK });

    await expect(engine.runService("db")).rejects.toThrow(ConfigError);
    expect(store.objects.size).toBe(0);
  });

  test("does not resolve a service name inherited from Object", async () => {
    const store = new MemoryObjectStore();
    const engine = new BackupEngine(config, store, { clock: CLOCK });

    await expect(engine.runService("constructor")).rejects.toThrow(
      'Service "constructor" not found in configuration',
    );
    expect(store.objects.size).toBe(0);
  });

  test("runAll records a service that cannot resolve and continues", async () => {
    const engine = new BackupEngine(config, new MemoryObjectStore(), { clock: CLOCK });

    const results = await engine.runAll({ paths: ["uploads"] });

    expect(results.map((r) => [r.service, r.error])).toEqual([
      ["api", undefined],
      ["web", "No valid paths to back up for service web"],
    ]);
    expect(summarizeBackup(results)).toEqual({ succeeded: 1, failed: 1 });
  });

  test("removes scratch files after every run", async () => {
    const engine = new BackupEngine(config, new MemoryObjectStore(), { clock: CLOCK });

    await engine.runService("api");

    expect(await readdir(scratchDir)).toEqual([]);
  });

  test("stops before the next path once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const store = new MemoryObjectStore();
    const engine = new BackupEngine(config, store, { clock: CLOCK });

    await expect(engine.runService("api", { signal: controller.signal })).rejects.toMatchObject({
      name: "AbortError",
    });
    expect(store.objects.size).toBe(0);
  });

  describe("auto-cleanup", () => {
    test("prunes old archives after a successful backup", async () => {
      const store = new MemoryObjectStore();
      store.seed("backups/web/static/20240101-000000.tar.gz", "old");
      store.seed("backups/web/static/20240102-000000.tar.gz", "older");
      store.seed("backups/web/static/20240229-000000.tar.gz", "recent");
      const engine = new BackupEngine({ ...config, autoCleanup: true }, store, { clock: CLOCK });

      await engine.runService("web");

      expect([...store.objects.keys()].sort()).toEqual([
        "backups/web/static/20240229-000000.tar.gz",
        "backups/web/static/20240301-020509.tar.gz",
      ]);
    });

    test("leaves the store alone when every path failed", async () => {
      const store = new MemoryObjectStore();
      store.seed("backups/web/static/20240101-000000.tar.gz", "old");
      store.failWith.put = () => new Error("Access Denied");
      const engine = new BackupEngine({ ...config, autoCleanup: true }, store, { clock: CLOCK });

      await engine.runService("web");

      expect(store.deleteBatches).toEqual([]);
      expect(store.objects.has("backups/web/static/20240101-000000.tar.gz")).toBe(true);
    });
  });

  test.skipIf(cannotDenyReads)("an unreadable file does not fail its path", async () => {
    const root = path.join(tempDir, "partly-locked");
    const locked = path.join(root, "secret.key");
    await mkdir(root, { recursive: true });
    await writeFile(path.join(root, "notes.txt"), "notes");
    await writeFile(locked, "secret");
    await chmod(locked, 0o000);

    try {
      const store = new MemoryObjectStore();
      const engine = new BackupEngine(
        makeConfig({ ...config, services: { ops: { paths: { files: root } } } }),
        store,
        { clock: CLOCK },
      );

      const result = await engine.runService("ops");

      expect(result.results.map((r) => [r.path, r.filesCount, r.error])).toEqual([
        ["files", 1, undefined],
      ]);
      const archive = store.objects.get("backups/ops/files/20240301-020509.tar.gz");
      const names = (await listEntries(gunzipSync(archive ?? Buffer.alloc(0)))).map((h) => h.name);
      expect(names).toEqual(["notes.txt"]);
    } finally {
      await chmod(locked, 0o644);
    }
  });
});
