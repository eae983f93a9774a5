/**
 * Basic Usage Example
 *
 * Builds a client-side index from an in-memory snapshot and plans a query.
 * Run with: npm run build && npx tsx examples/basic-usage.ts
 */

import {
  MemorySeriesSource,
  buildClientSideIndex,
  matchesField,
  matchesMeasurement,
  matchesTagSets,
  matchesTimeInterval,
  parseSeriesQuery,
  TimeInterval,
} from "@seriesindex/sdk";

async function main(): Promise<void> {
  // Snapshot: what a full scan of the store's tables would list
  const source = new MemorySeriesSource({
    series_double: [
      "cpu,hostname=host_0,region=eu-central-1#usage_idle#2016-01-01",
      "cpu,hostname=host_1,region=eu-central-1#usage_idle#2016-01-01",
      "cpu,hostname=host_0,region=eu-central-1#usage_idle#2016-01-02",
    ],
    series_bigint: ["mem,hostname=host_0,region=us-west-1#available#2016-01-01"],
  });

  console.log("Building index...");
  const index = await buildClientSideIndex(source);
  console.log(index.stats());

  // Lookups by exact bucket and by tag
  const jan1 = TimeInterval.forBucket(Date.UTC(2016, 0, 1));
  console.log(`\nSeries in ${jan1.key}: ${index.rowsInTimeInterval(jan1).size}`);
  console.log(`Series tagged hostname=host_0: ${index.rowsWithTag("hostname=host_0").size}`);

  // Planning by hand: apply the four predicates to a copy of the rows
  const range = new TimeInterval(Date.UTC(2016, 0, 1, 12), Date.UTC(2016, 0, 2, 12));
  const tagSets = [["hostname=host_0", "hostname=host_1"], ["region=eu-central-1"]];
  const byHand = index
    .copyOfRows()
    .filter(
      (s) =>
        matchesMeasurement(s, "cpu") &&
        matchesField(s, "usage_idle") &&
        matchesTimeInterval(s, range) &&
        matchesTagSets(s, tagSets)
    );
  console.log("\nCandidates (predicates):");
  byHand.forEach((s) => console.log(`  ${s.table} ${s.id}`));

  // Same plan through the index, from a JSON query
  const query = parseSeriesQuery({
    measurement: "cpu",
    field: "usage_idle",
    tagSets,
    start: "2016-01-01T12:00:00Z",
    end: "2016-01-02T12:00:00Z",
  });
  const selected = index.select(query);
  console.log(`\nCandidates (select): ${selected.length}`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
