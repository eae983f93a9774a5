/**
 * Performance benchmarks for index build and candidate selection
 * Run with: VITEST_PERF=1 npm test --workspace @seriesindex/sdk
 */

import { describe, it, expect, beforeAll } from "vitest";
import { ClientSideIndex } from "../src/client-side-index.js";
import { TimeInterval } from "../src/time-interval.js";
import { logger } from "../src/observability/logs.js";
import type { RawSeriesId } from "../src/types.js";

// Only run benchmarks if VITEST_PERF is set
const describeIf = process.env.VITEST_PERF ? describe : describe.skip;

const HOSTS = 1000;
const FIELDS = ["usage_user", "usage_system", "usage_idle", "usage_iowait"];
const DAYS = ["2016-01-01", "2016-01-02", "2016-01-03", "2016-01-04", "2016-01-05"];

function snapshot(): RawSeriesId[] {
  const pairs: RawSeriesId[] = [];
  for (let host = 0; host < HOSTS; host++) {
    const region = host % 2 === 0 ? "eu-central-1" : "us-west-1";
    for (const field of FIELDS) {
      for (const day of DAYS) {
        pairs.push({
          table: "series_double",
          id: `cpu,hostname=host_${host},region=${region},rack=${host % 100}#${field}#${day}`,
        });
      }
    }
  }
  return pairs;
}

describeIf("Client-side index benchmarks", () => {
  let pairs: RawSeriesId[];
  let index: ClientSideIndex;

  beforeAll(() => {
    logger.setEnabled(false);
    pairs = snapshot();
    index = ClientSideIndex.fromRaw(pairs);
  });

  it("builds 20k series < 1000ms", () => {
    const start = performance.now();
    const built = ClientSideIndex.fromRaw(pairs);
    const duration = performance.now() - start;

    console.log(`Build: ${built.size} series in ${duration.toFixed(1)}ms`);
    expect(built.size).toBe(HOSTS * FIELDS.length * DAYS.length);
    expect(duration).toBeLessThan(1000);
  });

  it("selects 8 hosts over 12 hours, 1000 times < 500ms", () => {
    const hosts = Array.from({ length: 8 }, (_, i) => `hostname=host_${i * 7}`);
    const query = {
      measurement: "cpu",
      field: "usage_user",
      tagSets: [hosts],
      interval: new TimeInterval(Date.UTC(2016, 0, 2, 6), Date.UTC(2016, 0, 2, 18)),
    };

    const start = performance.now();
    let found = 0;
    for (let i = 0; i < 1000; i++) {
      found = index.select(query).length;
    }
    const duration = performance.now() - start;

    console.log(`Select: ${found} candidates x1000 in ${duration.toFixed(1)}ms`);
    expect(found).toBe(8);
    expect(duration).toBeLessThan(500);
  });
});
