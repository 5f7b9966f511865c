/**
 * Run IDs. A mapping run gets one ID; every log line of the run carries it.
 */

import { randomBytes } from "node:crypto";

export interface RunIdOptions {
  /** Mapping name, folded into the ID so runs of one mapping sort together */
  mapping?: string;
  now?: Date;
}

function slug(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * `<yyyymmdd>[-<mapping>]-<6 hex>`, e.g. "20240115-product-category-a1b2c3".
 */
export function generateRunId(options: RunIdOptions = {}): string {
  const datePart = (options.now ?? new Date()).toISOString().slice(0, 10).replace(/-/g, "");
  const mappingPart = options.mapping !== undefined ? slug(options.mapping) : "";
  const randomPart = randomBytes(3).toString("hex");
  return mappingPart ? `${datePart}-${mappingPart}-${randomPart}` : `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Set the run ID for this process; pass an ID to correlate with an
 * earlier run.
 */
export function initRunId(runId?: string): string {
  currentRunId = runId ?? generateRunId();
  return currentRunId;
}

/** Null before initRunId. */
export function getRunId(): string | null {
  return currentRunId;
}
