/**
 * Default configuration values
 */

import type { StowageConfig } from "../types";

export const DEFAULT_CONFIG: Omit<StowageConfig, "s3" | "services" | "retention"> & {
  s3: Pick<StowageConfig["s3"], "prefix">;
} = {
  // bucket, services and retention are intentionally NOT defaulted
  s3: {
    prefix: "backups",
  },
  autoCleanup: false,
  notifications: {
    onSuccess: false,
    onError: true,
    onWarning: true,
  },
  backup: {
    preserveAcls: false,
    compression: true,
    minSize: 0,
  },
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source overriding target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
