/**
 * Configuration validation
 */

import * as path from "node:path";
import type { StowageConfig } from "../types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

const validators: Record<string, Validator> = {
  s3: (c) => {
    if (!isRecord(c.s3)) {
      throw new ConfigError("Config must have an 's3' section");
    }
    const s3 = c.s3;
    if (!s3.bucket || typeof s3.bucket !== "string") {
      throw new ConfigError("s3.bucket is required");
    }
    if (typeof s3.prefix !== "string") {
      throw new ConfigError("s3.prefix must be a string");
    }
    for (const field of ["region", "endpoint", "accessKeyId", "secretAccessKey"]) {
      if (s3[field] !== undefined && typeof s3[field] !== "string") {
        throw new ConfigError(`s3.${field} must be a string`);
      }
    }
  },

  services: (c) => {
    if (!isRecord(c.services)) {
      throw new ConfigError("Config must have a 'services' object with named services");
    }
    const entries = Object.entries(c.services);
    if (entries.length === 0) {
      throw new ConfigError("At least one service must be configured");
    }
    for (const [name, service] of entries) {
      validateService(name, service);
    }
  },

  retention: (c) => {
    if (typeof c.retention !== "number" || !Number.isFinite(c.retention) || c.retention <= 0) {
      throw new ConfigError("retention must be a number of days greater than 0");
    }
  },

  autoCleanup: (c) => {
    if (typeof c.autoCleanup !== "boolean") {
      throw new ConfigError("autoCleanup must be a boolean");
    }
  },

  notifications: (c) => {
    if (!isRecord(c.notifications)) {
      throw new ConfigError("notifications must be an object");
    }
    const n = c.notifications;
    if (n.discordWebhook !== undefined && typeof n.discordWebhook !== "string") {
      throw new ConfigError("notifications.discordWebhook must be a string");
    }
    for (const toggle of ["onSuccess", "onError", "onWarning"]) {
      if (typeof n[toggle] !== "boolean") {
        throw new ConfigError(`notifications.${toggle} must be a boolean`);
      }
    }
  },

  backup: (c) => {
    if (!isRecord(c.backup)) {
      throw new ConfigError("backup must be an object");
    }
    const b = c.backup;
    if (b.tempDir !== undefined && typeof b.tempDir !== "string") {
      throw new ConfigError("backup.tempDir must be a string");
    }
    if (typeof b.preserveAcls !== "boolean") {
      throw new ConfigError("backup.preserveAcls must be a boolean");
    }
    if (typeof b.compression !== "boolean") {
      throw new ConfigError("backup.compression must be a boolean");
    }
    if (typeof b.minSize !== "number" || !Number.isFinite(b.minSize)) {
      throw new ConfigError("backup.minSize must be a number");
    }
    if (b.minSize < 0) {
      throw new ConfigError("backup.minSize cannot be negative");
    }
  },
};

function validateService(name: string, service: unknown): void {
  if (name.includes("/")) {
    throw new ConfigError(`Service name "${name}" must not contain "/"`);
  }
  if (!isRecord(service)) {
    throw new ConfigError(`services.${name} must be an object`);
  }
  if (!isRecord(service.paths) || Object.keys(service.paths).length === 0) {
    throw new ConfigError(`Service ${name} must have at least one path configured`);
  }

  for (const [pathName, location] of Object.entries(service.paths)) {
    if (pathName.split("/").some((segment) => segment.length === 0)) {
      throw new ConfigError(`services.${name}.paths has an invalid path name "${pathName}"`);
    }
    if (typeof location !== "string") {
      throw new ConfigError(`services.${name}.paths.${pathName} must be a string`);
    }
    if (!path.isAbsolute(location)) {
      throw new ConfigError(`Service ${name} path ${pathName} must be an absolute path`);
    }
  }

  if (service.includeFolders === undefined) return;

  if (!isRecord(service.includeFolders)) {
    throw new ConfigError(`services.${name}.includeFolders must be an object`);
  }
  for (const [pathName, folders] of Object.entries(service.includeFolders)) {
    if (!Object.hasOwn(service.paths, pathName)) {
      throw new ConfigError(
        `services.${name}.includeFolders references unknown path "${pathName}"`,
      );
    }
    if (!isStringArray(folders)) {
      throw new ConfigError(`services.${name}.includeFolders.${pathName} must be a list of strings`);
    }
  }
}

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is StowageConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
