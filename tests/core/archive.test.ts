import {
  chmod,
  mkdir,
  mkdtemp,
  readFile,
  readlink,
  rm,
  stat,
  symlink,
  truncate,
  writeFile,
} from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { PassThrough, Readable } from "node:stream";
import { gunzipSync, gzipSync } from "node:zlib";
import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import {
  ACL_PAX_KEY,
  ArchiveError,
  createArchive,
  extractArchive,
} from "../../src/core/archive/archiver";
import {
  normalizeIncludeTerm,
  shouldEmit,
  shouldInclude,
} from "../../src/core/archive/include-filter";
import type { PermissionCapability } from "../../src/core/archive/permissions";
import { setLogLevel } from "../../src/utils/logger";
import { collector, listEntries, packEntries } from "../helpers/archive";

function fakePermissions(): PermissionCapability & { restored: Map<string, string> } {
  const restored = new Map<string, string>();
  return {
    supported: true,
    restored,
    getPermissionDescriptor: async (filePath) => Buffer.from(`acl:${path.basename(filePath)}`),
    setPermissionDescriptor: async (filePath, descriptor) => {
      restored.set(filePath, descriptor.toString());
    },
  };
}

// chmod 000 does not deny reads to root, and is not honoured on Windows
const cannotDenyReads = process.platform === "win32" || process.getuid?.() === 0;

describe("archive", () => {
  let tempDir: string;
  let sourceDir: string;

  beforeAll(async () => {
    setLogLevel("error");
    tempDir = await mkdtemp(path.join(os.tmpdir(), "stowage-archive-test-"));
    sourceDir = path.join(tempDir, "source");

    await mkdir(path.join(sourceDir, "sub"), { recursive: true });
    await writeFile(path.join(sourceDir, "a.txt"), "alpha");
    await writeFile(path.join(sourceDir, "sub", "b.txt"), "bravo");
    await writeFile(path.join(sourceDir, "empty.txt"), "");
    await symlink("a.txt", path.join(sourceDir, "link"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("include filter", () => {
    test("always includes the root", () => {
      expect(shouldInclude(".", ["uploads"])).toBe(true);
    });

    test("includes everything without terms", () => {
      expect(shouldInclude("other/y.png", [])).toBe(true);
      expect(shouldEmit("other/y.png", [])).toBe(true);
    });

    test("includes entries under a term and excludes the rest", () => {
      expect(shouldInclude("uploads/x.png", ["uploads"])).toBe(true);
      expect(shouldInclude("other/y.png", ["uploads"])).toBe(false);
    });

    test("walks parents of a nested term without emitting them", () => {
      expect(shouldInclude("media", ["media/thumbs"])).toBe(true);
      expect(shouldEmit("media", ["media/thumbs"])).toBe(false);
      expect(shouldEmit("media/thumbs/t.png", ["media/thumbs"])).toBe(true);
    });

    test("compares raw string prefixes", () => {
      expect(shouldEmit("data-old", ["data"])).toBe(true);
    });

    test("never emits the root", () => {
      expect(shouldEmit(".", [])).toBe(false);
    });

    test("normalizes separators and leading ./", () => {
      expect(normalizeIncludeTerm(".\\uploads\\")).toBe("uploads");
      expect(normalizeIncludeTerm("./media/thumbs/")).toBe("media/thumbs");
    });
  });

  describe("createArchive", () => {
    test("writes every entry relative to the root", async () => {
      const out = collector();

      const stats = await createArchive(out.stream, sourceDir, {
        compression: false,
        preservePermissions: false,
      });

      const headers = await listEntries(out.data());
      const names = headers.map((h) => h.name).sort();

      expect(names).toEqual(["a.txt", "empty.txt", "link", "sub", "sub/b.txt"]);
      expect(headers.find((h) => h.name === "link")?.linkname).toBe("a.txt");
      expect(headers.find((h) => h.name === "sub")?.type).toBe("directory");
      expect(stats).toEqual({ filesProcessed: 3, totalBytes: 10, skipped: 0 });
    });

    test("gzips the stream when compression is on", async () => {
      const out = collector();

      await createArchive(out.stream, sourceDir, {
        compression: true,
        preservePermissions: false,
      });

      const data = out.data();
      expect([data[0], data[1]]).toEqual([0x1f, 0x8b]);

      const names = (await listEntries(gunzipSync(data))).map((h) => h.name).sort();
      expect(names).toEqual(["a.txt", "empty.txt", "link", "sub", "sub/b.txt"]);
    });

    test("keeps only included folders", async () => {
      const root = path.join(tempDir, "filtered");
      await mkdir(path.join(root, "uploads"), { recursive: true });
      await mkdir(path.join(root, "other"), { recursive: true });
      await mkdir(path.join(root, "media", "thumbs"), { recursive: true });
      await mkdir(path.join(root, "media", "full"), { recursive: true });
      await writeFile(path.join(root, "uploads", "x.png"), "x");
      await writeFile(path.join(root, "other", "y.png"), "y");
      await writeFile(path.join(root, "media", "thumbs", "t.png"), "t");
      await writeFile(path.join(root, "media", "full", "f.png"), "f");
      await writeFile(path.join(root, "top.txt"), "top");

      const out = collector();
      const stats = await createArchive(out.stream, root, {
        compression: false,
        preservePermissions: false,
        includeFolders: ["uploads", "./media/thumbs/"],
      });

      const names = (await listEntries(out.data())).map((h) => h.name).sort();
      expect(names).toEqual(["media/thumbs", "media/thumbs/t.png", "uploads", "uploads/x.png"]);
      expect(stats.filesProcessed).toBe(2);
    });

    test("stores permission descriptors in PAX records", async () => {
      const out = collector();

      await createArchive(out.stream, sourceDir, {
        compression: false,
        preservePermissions: true,
        permissions: fakePermissions(),
      });

      const headers = await listEntries(out.data());
      const file = headers.find((h) => h.name === "a.txt");
      expect(file?.pax?.[ACL_PAX_KEY]).toBe(Buffer.from("acl:a.txt").toString("base64"));
    });

    test("leaves descriptors out when preservation is off", async () => {
      const out = collector();

      await createArchive(out.stream, sourceDir, {
        compression: false,
        preservePermissions: false,
        permissions: fakePermissions(),
      });

      const headers = await listEntries(out.data());
      expect(headers.find((h) => h.name === "a.txt")?.pax?.[ACL_PAX_KEY]).toBeUndefined();
    });

    test("pads a file that shrinks while being read", async () => {
      const root = path.join(tempDir, "shrinking");
      const logFile = path.join(root, "app.log");
      await mkdir(root, { recursive: true });
      await writeFile(logFile, "0123456789");

      // Runs after the file is opened and its size taken, before the body is read
      const truncating: PermissionCapability = {
        supported: true,
        getPermissionDescriptor: async (filePath) => {
          if (filePath === logFile) await truncate(filePath, 1);
          return null;
        },
        setPermissionDescriptor: async () => {},
      };

      const out = collector();
      const stats = await createArchive(out.stream, root, {
        compression: false,
        preservePermissions: true,
        permissions: truncating,
      });

      expect(stats).toEqual({ filesProcessed: 0, totalBytes: 0, skipped: 1 });
      const [header] = await listEntries(out.data());
      expect(header?.size).toBe(10);

      const dest = path.join(tempDir, "restored-shrinking");
      await extractArchive(Readable.from([out.data()]), dest, {
        compression: false,
        preservePermissions: false,
      });
      expect(await readFile(path.join(dest, "app.log"))).toEqual(
        Buffer.concat([Buffer.from("0"), Buffer.alloc(9)]),
      );
    });

    test.skipIf(cannotDenyReads)("skips unreadable files and directories", async () => {
      const root = path.join(tempDir, "unreadable");
      const lockedDir = path.join(root, "locked-dir");
      const lockedFile = path.join(root, "locked.txt");
      await mkdir(lockedDir, { recursive: true });
      await writeFile(path.join(lockedDir, "hidden.txt"), "hidden");
      await writeFile(lockedFile, "locked");
      await writeFile(path.join(root, "open.txt"), "open");
      await chmod(lockedFile, 0o000);
      await chmod(lockedDir, 0o000);

      try {
        const out = collector();
        const stats = await createArchive(out.stream, root, {
          compression: false,
          preservePermissions: false,
        });

        const names = (await listEntries(out.data())).map((h) => h.name).sort();
        expect(names).toEqual(["locked-dir", "open.txt"]);
        expect(stats).toEqual({ filesProcessed: 1, totalBytes: 4, skipped: 2 });
      } finally {
        await chmod(lockedDir, 0o755);
        await chmod(lockedFile, 0o644);
      }
    });

    test("fails when the root is missing", async () => {
      const out = collector();

      await expect(
        createArchive(out.stream, path.join(tempDir, "missing"), {
          compression: true,
          preservePermissions: false,
        }),
      ).rejects.toThrow(ArchiveError);
      expect(out.stream.destroyed).toBe(true);
    });

    test("fails when the root is a file", async () => {
      const out = collector();
      const file = path.join(sourceDir, "a.txt");

      await expect(
        createArchive(out.stream, file, { compression: false, preservePermissions: false }),
      ).rejects.toThrow(`Archive root is not a directory: ${file}`);
    });

    test("stops when the signal is aborted", async () => {
      const out = collector();
      const controller = new AbortController();
      controller.abort();

      await expect(
        createArchive(out.stream, sourceDir, {
          compression: false,
          preservePermissions: false,
          signal: controller.signal,
        }),
      ).rejects.toMatchObject({ name: "AbortError" });
    });
  });

  describe("extractArchive", () => {
    test("restores a compressed archive", async () => {
      const out = collector();
      await createArchive(out.stream, sourceDir, { compression: true, preservePermissions: false });

      const dest = path.join(tempDir, "restored-gz");
      const stats = await extractArchive(Readable.from([out.data()]), dest, {
        compression: true,
        preservePermissions: false,
      });

      expect(await readFile(path.join(dest, "a.txt"), "utf8")).toBe("alpha");
      expect(await readFile(path.join(dest, "sub", "b.txt"), "utf8")).toBe("bravo");
      expect(await readFile(path.join(dest, "empty.txt"), "utf8")).toBe("");
      expect(await readlink(path.join(dest, "link"))).toBe("a.txt");
      expect(stats).toEqual({ filesProcessed: 3, totalBytes: 10, skipped: 0 });
    });

    test("reads a plain tar even when compression is expected", async () => {
      const archive = await packEntries([{ name: "notes.txt", content: "plain" }]);

      const dest = path.join(tempDir, "restored-plain");
      const stats = await extractArchive(Readable.from([archive]), dest, {
        compression: true,
        preservePermissions: false,
      });

      expect(await readFile(path.join(dest, "notes.txt"), "utf8")).toBe("plain");
      expect(stats.filesProcessed).toBe(1);
    });

    test("creates missing parent directories", async () => {
      const archive = await packEntries([{ name: "deep/er/file.txt", content: "nested" }]);

      const dest = path.join(tempDir, "restored-parents");
      await extractArchive(Readable.from([archive]), dest, {
        compression: false,
        preservePermissions: false,
      });

      expect(await readFile(path.join(dest, "deep", "er", "file.txt"), "utf8")).toBe("nested");
    });

    test("skips entries that would land outside the destination", async () => {
      const archive = await packEntries([
        { name: "../escaped.txt", content: "nope" },
        { name: "inside.txt", content: "yes" },
      ]);

      const dest = path.join(tempDir, "restored-safe");
      const stats = await extractArchive(Readable.from([archive]), dest, {
        compression: false,
        preservePermissions: false,
      });

      expect(await readFile(path.join(dest, "inside.txt"), "utf8")).toBe("yes");
      await expect(readFile(path.join(tempDir, "escaped.txt"))).rejects.toMatchObject({
        code: "ENOENT",
      });
      expect(stats).toEqual({ filesProcessed: 1, totalBytes: 3, skipped: 1 });
    });

    test("does not write through a symlink from the same archive", async () => {
      const outside = path.join(tempDir, "outside");
      await mkdir(outside, { recursive: true });
      const archive = await packEntries([
        { name: "link", type: "symlink", linkname: outside },
        { name: "link/pwned.txt", content: "escaped" },
        { name: "link/sub/deep.txt", content: "deeper" },
        { name: "safe.txt", content: "safe" },
      ]);

      const dest = path.join(tempDir, "restored-link-escape");
      const stats = await extractArchive(Readable.from([archive]), dest, {
        compression: false,
        preservePermissions: false,
      });

      await expect(readFile(path.join(outside, "pwned.txt"))).rejects.toMatchObject({
        code: "ENOENT",
      });
      await expect(stat(path.join(outside, "sub"))).rejects.toMatchObject({ code: "ENOENT" });
      expect(await readlink(path.join(dest, "link"))).toBe(outside);
      expect(await readFile(path.join(dest, "safe.txt"), "utf8")).toBe("safe");
      expect(stats).toEqual({ filesProcessed: 1, totalBytes: 4, skipped: 2 });
    });

    test("replaces an existing symlink instead of writing through it", async () => {
      const outside = path.join(tempDir, "outside-target.txt");
      await writeFile(outside, "original");
      const dest = path.join(tempDir, "restored-link-replace");
      await mkdir(dest, { recursive: true });
      await symlink(outside, path.join(dest, "config.txt"));

      const archive = await packEntries([{ name: "config.txt", content: "restored" }]);
      await extractArchive(Readable.from([archive]), dest, {
        compression: false,
        preservePermissions: false,
      });

      expect(await readFile(outside, "utf8")).toBe("original");
      expect(await readFile(path.join(dest, "config.txt"), "utf8")).toBe("restored");
    });

    test("releases the input stream when extraction fails", async () => {
      const archive = gzipSync(await packEntries([{ name: "blocker/inner.txt", content: "inner" }]));
      const dest = path.join(tempDir, "restored-blocked");
      await mkdir(dest, { recursive: true });
      await writeFile(path.join(dest, "blocker"), "in the way");

      // Never ended, like a response body still waiting on the network
      const input = new PassThrough();
      input.write(archive);

      await expect(
        extractArchive(input, dest, { compression: true, preservePermissions: false }),
      ).rejects.toThrow();
      expect(input.destroyed).toBe(true);
    });

    test("skips unsupported entry types", async () => {
      const archive = await packEntries([
        { name: "fifo", content: "", type: "fifo" },
        { name: "kept.txt", content: "kept" },
      ]);

      const dest = path.join(tempDir, "restored-types");
      const stats = await extractArchive(Readable.from([archive]), dest, {
        compression: false,
        preservePermissions: false,
      });

      expect(stats).toEqual({ filesProcessed: 1, totalBytes: 4, skipped: 1 });
    });

    test("restores permission descriptors", async () => {
      const out = collector();
      await createArchive(out.stream, sourceDir, {
        compression: false,
        preservePermissions: true,
        permissions: fakePermissions(),
      });

      const permissions = fakePermissions();
      const dest = path.join(tempDir, "restored-acl");
      await extractArchive(Readable.from([out.data()]), dest, {
        compression: false,
        preservePermissions: true,
        permissions,
      });

      expect(permissions.restored.get(path.join(dest, "a.txt"))).toBe("acl:a.txt");
      expect(permissions.restored.get(path.join(dest, "sub"))).toBe("acl:sub");
    });
  });
});
