import { describe, it, expect } from "vitest";
import {
  matches,
  matchesField,
  matchesMeasurement,
  matchesTagSets,
  matchesTimeInterval,
  selectSeries,
} from "./query.js";
import { parseSeries } from "./series.js";
import { TimeInterval } from "./time-interval.js";

const JAN_1 = Date.UTC(2016, 0, 1);
const JAN_2 = Date.UTC(2016, 0, 2);
const JAN_3 = Date.UTC(2016, 0, 3);

describe("matchesTimeInterval", () => {
  const series = parseSeries("T", "cpu,hostname=host_0#usage_idle#2016-01-01");

  it("should match an interval overlapping the bucket", () => {
    expect(matchesTimeInterval(series, new TimeInterval(JAN_1, JAN_2))).toBe(true);
    expect(matchesTimeInterval(series, new TimeInterval(JAN_1 + 1000, JAN_3))).toBe(true);
  });

  it("should not match an interval that only touches the bucket", () => {
    expect(matchesTimeInterval(series, new TimeInterval(JAN_2, JAN_3))).toBe(false);
    expect(matchesTimeInterval(series, new TimeInterval(JAN_1 - 1000, JAN_1))).toBe(false);
  });
});

describe("matchesMeasurement / matchesField", () => {
  const series = parseSeries("T", "cpu,hostname=host_0#usage_idle#2016-01-01");

  it("should compare names exactly", () => {
    expect(matchesMeasurement(series, "cpu")).toBe(true);
    expect(matchesMeasurement(series, "CPU")).toBe(false);
    expect(matchesMeasurement(series, "cp")).toBe(false);
    expect(matchesField(series, "usage_idle")).toBe(true);
    expect(matchesField(series, "usage_user")).toBe(false);
  });
});

describe("matchesTagSets", () => {
  const tagSets = [["hostname=host_0", "hostname=host_1"], ["region=eu-central-1"]];

  it("should match everything when there are no groups", () => {
    const bare = parseSeries("T", "cpu#usage_idle#2016-01-01");
    expect(matchesTagSets(bare, [])).toBe(true);
  });

  it("should require every group and any tag within a group", () => {
    const host0 = parseSeries("T", "cpu,hostname=host_0,region=eu-central-1#usage_idle#2016-01-01");
    const host1 = parseSeries("T", "cpu,hostname=host_1,region=eu-central-1#usage_idle#2016-01-01");
    const wrongRegion = parseSeries("T", "cpu,hostname=host_0,region=us-west-1#usage_idle#2016-01-01");
    const wrongHost = parseSeries("T", "cpu,hostname=host_2,region=eu-central-1#usage_idle#2016-01-01");

    expect(matchesTagSets(host0, tagSets)).toBe(true);
    expect(matchesTagSets(host1, tagSets)).toBe(true);
    expect(matchesTagSets(wrongRegion, tagSets)).toBe(false);
    expect(matchesTagSets(wrongHost, tagSets)).toBe(false);
  });

  it("should never satisfy an empty group", () => {
    const series = parseSeries("T", "cpu,hostname=host_0#usage_idle#2016-01-01");
    expect(matchesTagSets(series, [[]])).toBe(false);
  });
});

describe("matches", () => {
  const series = parseSeries("T", "cpu,hostname=host_0,region=eu-central-1#usage_idle#2016-01-01");

  it("should match an empty query", () => {
    expect(matches(series, {})).toBe(true);
  });

  it("should require every predicate the query sets", () => {
    const query = {
      measurement: "cpu",
      field: "usage_idle",
      interval: new TimeInterval(JAN_1, JAN_3),
      tagSets: [["region=eu-central-1"]],
    };
    expect(matches(series, query)).toBe(true);
    expect(matches(series, { ...query, measurement: "mem" })).toBe(false);
    expect(matches(series, { ...query, field: "usage_user" })).toBe(false);
    expect(matches(series, { ...query, interval: new TimeInterval(JAN_2, JAN_3) })).toBe(false);
    expect(matches(series, { ...query, tagSets: [["region=us-west-1"]] })).toBe(false);
  });
});

describe("selectSeries", () => {
  it("should filter and keep order", () => {
    const collection = [
      parseSeries("T", "cpu,hostname=host_1#usage_idle#2016-01-02"),
      parseSeries("T", "mem,hostname=host_0#available#2016-01-01"),
      parseSeries("T", "cpu,hostname=host_0#usage_idle#2016-01-01"),
    ];

    const selected = selectSeries(collection, { measurement: "cpu" });
    expect(selected.map((s) => s.id)).toEqual([
      "cpu,hostname=host_1#usage_idle#2016-01-02",
      "cpu,hostname=host_0#usage_idle#2016-01-01",
    ]);
    expect(selected[0]).toBe(collection[0]);
  });
});
