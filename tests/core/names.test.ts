import { describe, expect, test } from "vitest";
import { generationName, parseSnapshotName, timestampName } from "../../src/core/retention/names";

describe("parseSnapshotName", () => {
  test("reads generation names", () => {
    expect(parseSnapshotName("daily.0")).toEqual({ retention: "daily", generation: 0 });
    expect(parseSnapshotName("daily.12")).toEqual({ retention: "daily", generation: 12 });
    expect(parseSnapshotName("pre.upgrade.3")).toEqual({ retention: "pre.upgrade", generation: 3 });
  });

  test("reads timestamp names", () => {
    expect(parseSnapshotName("weekly:2024-01-15T03:04:05")).toEqual({
      retention: "weekly",
      timestamp: "2024-01-15T03:04:05",
    });
  });

  test("treats anything else as its own class", () => {
    expect(parseSnapshotName("manual")).toEqual({ retention: "manual" });
    expect(parseSnapshotName("daily.")).toEqual({ retention: "daily." });
    expect(parseSnapshotName(":odd")).toEqual({ retention: ":odd" });
  });
});

describe("snapshot names", () => {
  test("builds generation and timestamp names", () => {
    expect(generationName("daily", 2)).toBe("daily.2");
    expect(timestampName("weekly", new Date(2024, 0, 15, 3, 4, 5))).toBe("weekly:2024-01-15T03:04:05");
  });
});
