/**
 * Pending Conversions Service
 *
 * In-memory store for a parsed statement between the upload step, the
 * friendly-name step and the download. Entries auto-expire after 30 minutes.
 */

import { randomUUID } from "crypto";
import type { StatementTable } from "../csv/statementParser.js";

export interface PendingConversion {
  /** Uploaded file name, for display */
  fileName: string;
  /** Parsed transaction table */
  statement: StatementTable;
  /** Written to the Notes column of every output row */
  importId: number;
  /** Account numbers found in TEF references */
  internalRefs: string[];
  /** Account numbers found in SINPE references */
  interbankRefs: string[];
  /** Expiry timestamp (ms since epoch) */
  expiresAt: number;
}

/** 30 minutes in milliseconds */
const EXPIRY_MS = 30 * 60 * 1000;

const pendingConversions = new Map<string, PendingConversion>();

/**
 * Store a pending conversion and return its ID
 */
export function createPendingConversion(data: Omit<PendingConversion, "expiresAt">): string {
  const id = randomUUID();
  pendingConversions.set(id, {
    ...data,
    expiresAt: Date.now() + EXPIRY_MS,
  });
  return id;
}

/**
 * Retrieve a pending conversion by ID
 * Returns null if not found or expired
 */
export function getPendingConversion(id: string): PendingConversion | null {
  const pending = pendingConversions.get(id);
  if (!pending) {
    return null;
  }

  if (Date.now() > pending.expiresAt) {
    pendingConversions.delete(id);
    return null;
  }

  return pending;
}

/**
 * Clean up expired entries (called periodically by the server)
 */
export function cleanupExpiredConversions(): number {
  const now = Date.now();
  let cleaned = 0;

  for (const [id, pending] of pendingConversions) {
    if (now > pending.expiresAt) {
      pendingConversions.delete(id);
      cleaned++;
    }
  }

  return cleaned;
}

/**
 * Unix timestamp in seconds, used as the import ID of an upload
 */
export function createImportId(now: number = Date.now()): number {
  return Math.floor(now / 1000);
}
