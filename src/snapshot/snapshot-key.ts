/**
 * Snapshot keys look like `https_example.com__20261019T101500123Z`, with an
 * optional `-NNN` suffix when two snapshots of one origin land in the same
 * millisecond. Lexicographic order of the stamps is creation order.
 */

const SEPARATOR = '__';
const KEY_PATTERN = /^([A-Za-z0-9.-]+(?:_[A-Za-z0-9.-]+)*)__(\d{8}T\d{9}Z(?:-\d{3})?)$/;
const STAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{3})Z/;

export const SITE_LIST_ORIGIN = 'site-list';

export interface ParsedSnapshotKey {
  originSlug: string;
  stamp: string;
  createdAt: Date;
}

/**
 * `https://example.com:8443` becomes `https_example.com_8443`. Characters
 * outside `[A-Za-z0-9.-]`, underscores included, become `-` inside each part,
 * so `_` only ever separates scheme, host and port. Values that are not URLs,
 * such as {@link SITE_LIST_ORIGIN}, are sanitized as one part.
 */
export function toOriginSlug(origin: string): string {
  let parts: string[];
  try {
    const url = new URL(origin);
    parts = [url.protocol.replace(/:$/, ''), url.hostname, url.port];
  } catch {
    parts = [origin];
  }

  return parts
    .map((part) => part.replace(/[^A-Za-z0-9.-]/g, '-'))
    .filter(Boolean)
    .join('_');
}

export function formatStamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

export function buildSnapshotKey(
  origin: string,
  createdAt: Date,
  sequence = 0,
): string {
  const suffix = sequence > 0 ? `-${String(sequence).padStart(3, '0')}` : '';
  return `${toOriginSlug(origin)}${SEPARATOR}${formatStamp(createdAt)}${suffix}`;
}

export function parseSnapshotKey(key: string): ParsedSnapshotKey | null {
  const match = KEY_PATTERN.exec(key);
  if (!match) {
    return null;
  }

  const [, originSlug, stamp] = match;
  const parts = STAMP_PATTERN.exec(stamp);
  if (!parts) {
    return null;
  }
  const [, year, month, day, hour, minute, second, millis] = parts;
  const createdAt = new Date(
    `${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}Z`,
  );
  if (Number.isNaN(createdAt.getTime())) {
    return null;
  }

  return { originSlug, stamp, createdAt };
}

/** Newest first. */
export function compareKeysByRecency(a: string, b: string): number {
  const stampA = parseSnapshotKey(a)?.stamp ?? '';
  const stampB = parseSnapshotKey(b)?.stamp ?? '';
  if (stampA === stampB) {
    return a < b ? 1 : a > b ? -1 : 0;
  }
  return stampA < stampB ? 1 : -1;
}
