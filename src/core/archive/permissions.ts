/**
 * Platform permission descriptors (POSIX ACLs via getfacl/setfacl, Windows
 * DACLs via icacls). Descriptors are opaque blobs to the archiver.
 */

import { execFile } from "node:child_process";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { promisify } from "node:util";
import { logger } from "../../utils/logger";

const execFileAsync = promisify(execFile);

export interface PermissionCapability {
  readonly supported: boolean;
  /** null when the entry has nothing to preserve or the platform tool is absent */
  getPermissionDescriptor(filePath: string): Promise<Buffer | null>;
  setPermissionDescriptor(filePath: string, descriptor: Buffer): Promise<void>;
}

function isMissingTool(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function withTempFile<T>(fn: (tempFile: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "stowage-acl-"));
  try {
    return await fn(path.join(dir, "acl"));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export const noopPermissions: PermissionCapability = {
  supported: false,
  getPermissionDescriptor: async () => null,
  setPermissionDescriptor: async () => {},
};

export const posixAclPermissions: PermissionCapability = {
  supported: true,

  async getPermissionDescriptor(filePath) {
    try {
      const { stdout } = await execFileAsync("getfacl", ["-p", filePath], { encoding: "buffer" });
      return stdout.length > 0 ? stdout : null;
    } catch (error) {
      if (isMissingTool(error)) {
        logger.debug("getfacl not found, skipping ACL capture");
        return null;
      }
      throw error;
    }
  },

  async setPermissionDescriptor(filePath, descriptor) {
    await withTempFile(async (tempFile) => {
      await writeFile(tempFile, descriptor);
      try {
        await execFileAsync("setfacl", [`--set-file=${tempFile}`, filePath]);
      } catch (error) {
        if (isMissingTool(error)) {
          logger.debug("setfacl not found, skipping ACL restore");
          return;
        }
        throw error;
      }
    });
  },
};

// icacls saves and restores by entry name relative to the directory it runs against
export const windowsAclPermissions: PermissionCapability = {
  supported: true,

  async getPermissionDescriptor(filePath) {
    return withTempFile(async (tempFile) => {
      try {
        await execFileAsync("icacls", [filePath, "/save", tempFile]);
      } catch (error) {
        if (isMissingTool(error)) {
          logger.debug("icacls not found, skipping ACL capture");
          return null;
        }
        throw error;
      }
      const saved = await readFile(tempFile);
      return saved.length > 0 ? saved : null;
    });
  },

  async setPermissionDescriptor(filePath, descriptor) {
    await withTempFile(async (tempFile) => {
      await writeFile(tempFile, descriptor);
      try {
        await execFileAsync("icacls", [path.dirname(filePath), "/restore", tempFile]);
      } catch (error) {
        if (isMissingTool(error)) {
          logger.debug("icacls not found, skipping ACL restore");
          return;
        }
        throw error;
      }
    });
  },
};

export function createPermissionCapability(
  platform: NodeJS.Platform = process.platform,
): PermissionCapability {
  switch (platform) {
    case "linux":
    case "darwin":
    case "freebsd":
      return posixAclPermissions;
    case "win32":
      return windowsAclPermissions;
    default:
      logger.debug(`ACL preservation not supported on ${platform}`);
      return noopPermissions;
  }
}
