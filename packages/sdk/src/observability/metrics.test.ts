import { describe, it, expect, beforeEach } from "vitest";
import { metrics } from "./metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should keep the counters of the latest run per family", () => {
    metrics.recordParse("line", 40, 30);
    metrics.recordProcess("line", 12);
    metrics.recordPack("line", 90, 4, 9);
    metrics.recordDuration("line", 7);
    metrics.recordParse("line", 20, 10);
    metrics.recordDuration("line", 3);

    expect(metrics.getMetrics("line")).toEqual({
      linesParsed: 20,
      rangesParsed: 10,
      rangesMerged: 12,
      propertyCount: 9,
      singleRangesCount: 4,
      packedLength: 90,
      durationMs: 3,
    });
    expect(metrics.getMetrics("word")).toBeUndefined();
  });

  it("should reset one family or all of them", () => {
    metrics.recordParse("line", 1, 1);
    metrics.recordParse("word", 1, 1);

    metrics.reset("line");
    expect([...metrics.getAllMetrics().keys()]).toEqual(["word"]);

    metrics.reset();
    expect(metrics.getAllMetrics().size).toBe(0);
  });
});
