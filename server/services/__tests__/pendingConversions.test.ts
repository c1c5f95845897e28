import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  cleanupExpiredConversions,
  createImportId,
  createPendingConversion,
  getPendingConversion,
} from "../pendingConversions.js";

const START = new Date("2024-03-01T12:00:00Z");
const MINUTE = 60 * 1000;

function conversion(fileName: string) {
  return {
    fileName,
    importId: 1709294400,
    statement: { columns: ["Fecha de Transacción"], rows: [], count: 0 },
    internalRefs: ["12345"],
    interbankRefs: [],
  };
}

describe("pending conversions", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    // Expire everything so tests do not see each other's entries
    vi.setSystemTime(new Date("2100-01-01T00:00:00Z"));
    cleanupExpiredConversions();
    vi.useRealTimers();
  });

  it("returns a stored conversion by ID", () => {
    const id = createPendingConversion(conversion("marzo.csv"));
    const pending = getPendingConversion(id);

    expect(pending?.fileName).toBe("marzo.csv");
    expect(pending?.internalRefs).toEqual(["12345"]);
    expect(pending?.expiresAt).toBe(START.getTime() + 30 * MINUTE);
  });

  it("returns null for an unknown ID", () => {
    expect(getPendingConversion("missing")).toBeNull();
  });

  it("expires conversions after 30 minutes", () => {
    const id = createPendingConversion(conversion("marzo.csv"));

    vi.setSystemTime(START.getTime() + 30 * MINUTE);
    expect(getPendingConversion(id)).not.toBeNull();

    vi.setSystemTime(START.getTime() + 31 * MINUTE);
    expect(getPendingConversion(id)).toBeNull();
  });

  it("cleans up only expired conversions", () => {
    const older = createPendingConversion(conversion("febrero.csv"));
    vi.setSystemTime(START.getTime() + 20 * MINUTE);
    const newer = createPendingConversion(conversion("marzo.csv"));
    vi.setSystemTime(START.getTime() + 35 * MINUTE);

    expect(cleanupExpiredConversions()).toBe(1);
    expect(getPendingConversion(older)).toBeNull();
    expect(getPendingConversion(newer)?.fileName).toBe("marzo.csv");
  });
});

describe("createImportId", () => {
  it("uses the Unix timestamp in seconds", () => {
    expect(createImportId(1709251200999)).toBe(1709251200);
  });
});
