/**
 * Configuration path resolution and service target resolution
 */

import * as path from "node:path";
import type { ServiceConfig, StowageConfig } from "../types";
import { logger } from "../utils/logger";
import { ConfigError } from "./validator";

export interface ResolvedPath {
  pathName: string;
  root: string;
  includeFolders: string[];
}

/**
 * Resolve relative paths in config to absolute paths
 */
export function resolvePaths(config: StowageConfig, configPath: string): StowageConfig {
  const configDir = path.dirname(path.resolve(configPath));
  const tempDir = config.backup.tempDir;

  if (tempDir && !path.isAbsolute(tempDir)) {
    return {
      ...config,
      backup: { ...config.backup, tempDir: path.resolve(configDir, tempDir) },
    };
  }

  return config;
}

/**
 * Configured service names in a stable order
 */
export function getServiceNames(config: StowageConfig): string[] {
  return Object.keys(config.services).sort();
}

/**
 * `record[key]` when `key` is the record's own entry; names such as
 * "constructor" never resolve through the prototype.
 */
export function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function getServiceConfig(config: StowageConfig, serviceName: string): ServiceConfig {
  const service = ownEntry(config.services, serviceName);
  if (!service) {
    throw new ConfigError(`Service "${serviceName}" not found in configuration`);
  }
  return service;
}

/**
 * Resolve the paths to back up for a service, optionally restricted to named paths.
 * Unknown names are skipped with a warning; resolving to nothing is an error.
 */
export function resolveServicePaths(
  config: StowageConfig,
  serviceName: string,
  pathFilter: string[] = [],
): ResolvedPath[] {
  const service = getServiceConfig(config, serviceName);

  let names = Object.keys(service.paths).sort();
  if (pathFilter.length > 0) {
    names = [];
    for (const name of pathFilter) {
      if (Object.hasOwn(service.paths, name)) {
        if (!names.includes(name)) names.push(name);
      } else {
        logger.warn(`Path ${name} not found in service ${serviceName} configuration`);
      }
    }
  }

  if (names.length === 0) {
    throw new ConfigError(`No valid paths to back up for service ${serviceName}`);
  }

  return names.map((pathName) => ({
    pathName,
    root: ownEntry(service.paths, pathName) ?? "",
    includeFolders: (service.includeFolders && ownEntry(service.includeFolders, pathName)) ?? [],
  }));
}
