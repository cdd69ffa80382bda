/**
 * Object key naming: {prefix}/{service}/{path-name}/{timestamp}.tar[.gz]
 *
 * The trailing filename is a canonical UTC timestamp, so lexicographic key
 * order within one path equals chronological order.
 */

export const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})$/;
export const TIMESTAMP_LENGTH = 15;
export const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

export const COMPRESSED_SUFFIX = ".tar.gz";
export const PLAIN_SUFFIX = ".tar";

export interface DecodedKey {
  service: string;
  path: string;
  timestamp: string;
  date: Date;
  compressed: boolean;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Canonical YYYYMMDD-HHMMSS form of a moment, in UTC
 */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function toUtcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  // Date.UTC rolls 20240230 over into March; reject anything that moved
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    return null;
  }
  return date;
}

/**
 * Parse a canonical timestamp. Anything but the exact 15-character form is null.
 */
export function parseTimestamp(text: string): Date | null {
  if (text.length !== TIMESTAMP_LENGTH) return null;
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    return null;
  }
  return toUtcDate(year, month, day, hours, minutes, seconds);
}

/**
 * Parse an 8-character YYYYMMDD calendar date (UTC midnight)
 */
export function parseCalendarDate(text: string): Date | null {
  const match = DATE_PATTERN.exec(text);
  if (!match) return null;

  const [, year, month, day] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined) return null;
  return toUtcDate(year, month, day);
}

export function archiveSuffix(compressed: boolean): string {
  return compressed ? COMPRESSED_SUFFIX : PLAIN_SUFFIX;
}

function normalizePrefix(prefix: string): string {
  return prefix.replace(/^\/+/, "").replace(/\/+$/, "");
}

/**
 * Listing prefix covering every archive: "backups/" (or "" without a prefix)
 */
export function rootPrefix(prefix: string): string {
  const normalized = normalizePrefix(prefix);
  return normalized ? `${normalized}/` : "";
}

/**
 * Listing prefix covering one service's archives: "backups/api/"
 */
export function servicePrefix(prefix: string, service: string): string {
  return `${rootPrefix(prefix)}${service}/`;
}

function isValidSegmentPath(value: string): boolean {
  return value.length > 0 && value.split("/").every((segment) => segment.length > 0);
}

export function encodeKey(
  prefix: string,
  service: string,
  pathName: string,
  timestamp: string,
  compressed: boolean,
): string {
  if (!service || service.includes("/")) {
    throw new Error(`Invalid service name for object key: "${service}"`);
  }
  if (!isValidSegmentPath(pathName)) {
    throw new Error(`Invalid path name for object key: "${pathName}"`);
  }
  if (!parseTimestamp(timestamp)) {
    throw new Error(`Invalid timestamp for object key: "${timestamp}"`);
  }

  return `${servicePrefix(prefix, service)}${pathName}/${timestamp}${archiveSuffix(compressed)}`;
}

/**
 * Decode an archive key. Keys from other tools sharing the bucket decode to null.
 */
export function decodeKey(key: string, prefix: string): DecodedKey | null {
  const base = rootPrefix(prefix);
  if (!key.startsWith(base)) return null;

  const parts = key.slice(base.length).split("/");
  if (parts.length < 3 || parts.some((part) => part.length === 0)) return null;

  const service = parts[0];
  const filename = parts[parts.length - 1];
  if (service === undefined || filename === undefined) return null;

  let compressed: boolean;
  let timestamp: string;
  if (filename.endsWith(COMPRESSED_SUFFIX)) {
    compressed = true;
    timestamp = filename.slice(0, -COMPRESSED_SUFFIX.length);
  } else if (filename.endsWith(PLAIN_SUFFIX)) {
    compressed = false;
    timestamp = filename.slice(0, -PLAIN_SUFFIX.length);
  } else {
    return null;
  }

  const date = parseTimestamp(timestamp);
  if (!date) return null;

  return {
    service,
    path: parts.slice(1, -1).join("/"),
    timestamp,
    date,
    compressed,
  };
}
