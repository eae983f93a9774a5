/**
 * End-to-end: listed ids → parsed series → index → candidate selection
 */

import { describe, it, expect } from "vitest";
import {
  ClientSideIndex,
  MemorySeriesSource,
  TimeInterval,
  buildClientSideIndex,
  matches,
  parseSeriesQuery,
} from "./index.js";

describe("series index end-to-end", () => {
  it("should index the two-series snapshot", () => {
    const index = ClientSideIndex.fromRaw([
      { table: "T", id: "cpu,hostname=host_0#usage_idle#2016-01-01" },
      { table: "T", id: "mem,hostname=host_1#available#2016-01-02" },
    ]);

    expect(index.copyOfRows()).toHaveLength(2);
    expect(index.byTimeInterval.size).toBe(2);
    expect(index.byTag.get("hostname=host_0")?.size).toBe(1);
    expect(index.byTag.get("hostname=host_1")?.size).toBe(1);
    expect([...(index.byTag.get("hostname=host_1") ?? [])][0]?.measurement).toBe("mem");
  });

  it("should plan candidates across tables and buckets", async () => {
    const hosts = ["host_0", "host_1", "host_2"];
    const days = ["2016-01-01", "2016-01-02", "2016-01-03"];
    const cpu = hosts.flatMap((host) =>
      days.map((day) => `cpu,hostname=${host},region=eu-central-1#usage_user#${day}`)
    );
    const disk = hosts.map((host) => `disk,hostname=${host},region=us-west-1#free#2016-01-01`);

    const index = await buildClientSideIndex(
      new MemorySeriesSource({ series_double: cpu, series_bigint: disk })
    );
    expect(index.size).toBe(12);
    expect(index.stats().timeIntervals).toBe(3);

    const query = parseSeriesQuery({
      measurement: "cpu",
      field: "usage_user",
      tagSets: [["hostname=host_0", "hostname=host_2"], ["region=eu-central-1"]],
      start: "2016-01-01T12:00:00Z",
      end: "2016-01-02T06:00:00Z",
    });

    const selected = index.select(query);
    expect(selected.map((s) => s.id)).toEqual([
      "cpu,hostname=host_0,region=eu-central-1#usage_user#2016-01-01",
      "cpu,hostname=host_0,region=eu-central-1#usage_user#2016-01-02",
      "cpu,hostname=host_2,region=eu-central-1#usage_user#2016-01-01",
      "cpu,hostname=host_2,region=eu-central-1#usage_user#2016-01-02",
    ]);

    // same answer as filtering a copy with the predicates
    expect(index.copyOfRows().filter((s) => matches(s, query))).toEqual(selected);
  });

  it("should keep exact buckets separate from range matching", () => {
    const index = ClientSideIndex.fromRaw([
      { table: "T", id: "cpu#usage_idle#2016-01-01" },
      { table: "T", id: "cpu#usage_idle#2016-01-02" },
    ]);
    const twoDays = new TimeInterval(Date.UTC(2016, 0, 1), Date.UTC(2016, 0, 3));

    expect(index.rowsInTimeInterval(twoDays).size).toBe(0);
    expect(index.select({ interval: twoDays })).toHaveLength(2);
  });
});
