/**
 * Snapshot short-name conventions for retention classes
 */

import { formatLocalTimestamp } from "../../utils/format";

export interface ParsedSnapshotName {
  retention: string;
  /** Slot number, generation scheme only */
  generation?: number;
  /** `YYYY-MM-DDTHH:MM:SS`, timestamp scheme only */
  timestamp?: string;
}

const GENERATION_SUFFIX = /^(.+)\.(\d+)$/;

/**
 * Split a short name (the part after `@`) into its retention class and
 * generation or timestamp. Names that follow neither scheme are their own class.
 */
export function parseSnapshotName(shortName: string): ParsedSnapshotName {
  const colon = shortName.indexOf(":");
  if (colon > 0) {
    return { retention: shortName.slice(0, colon), timestamp: shortName.slice(colon + 1) };
  }

  const match = GENERATION_SUFFIX.exec(shortName);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return { retention: match[1], generation: Number.parseInt(match[2], 10) };
  }

  return { retention: shortName };
}

export function generationName(retention: string, slot: number): string {
  return `${retention}.${slot}`;
}

export function timestampName(retention: string, date: Date): string {
  return `${retention}:${formatLocalTimestamp(date)}`;
}
