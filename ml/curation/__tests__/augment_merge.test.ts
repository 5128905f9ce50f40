import { describe, expect, it } from "vitest";

import { IndexedRowSchema } from "../../schemas/canonical_row";
import { assignIndex, finalizePool, mergeAugmented } from "../augment_merge";
import { fingerprintSet, fingerprintRow } from "../dedupe";
import { makePool, makeRow } from "./row_fixtures";

describe("mergeAugmented", () => {
  const train = makePool(2, 2, "train");
  const val = makePool(1, 1, "val");
  const test = makePool(1, 1, "test");
  const synth = [makeRow("int synth_a;", 1), makeRow("int synth_b;", 0)];

  it("appends synthetic rows to train only by default", () => {
    const merged = mergeAugmented({ train, val, test, synth });

    expect(merged.policy).toBe("train_only");
    expect(merged.train.map((row) => row.processed_func)).toEqual([
      ...train.map((row) => row.processed_func),
      "int synth_a;",
      "int synth_b;",
    ]);
    expect(merged.val?.map((row) => row.processed_func)).toEqual(val.map((row) => row.processed_func));
    expect(merged.test).toHaveLength(2);
    expect(merged.synth_used).toHaveLength(2);
  });

  it("appends synthetic rows to every split under all", () => {
    const merged = mergeAugmented({ train, val, test, synth, policy: "all" });

    expect(merged.train).toHaveLength(6);
    expect(merged.val).toHaveLength(4);
    expect(merged.test).toHaveLength(4);
    expect(merged.val?.slice(2).map((row) => row.processed_func)).toEqual(["int synth_a;", "int synth_b;"]);
  });

  it("withholds synthetic rows whose code is already in val or test", () => {
    const leaking = [...synth, makeRow(`${val[0].processed_func}\r\n`, 0), makeRow(test[1].processed_func, 1)];
    const merged = mergeAugmented({ train, val, test, synth: leaking });

    expect(merged.synth_dropped_eval_overlap).toBe(2);
    expect(merged.train).toHaveLength(6);

    const synthHashes = fingerprintSet(merged.synth_used);
    const evalRows = [...(merged.val ?? []), ...(merged.test ?? [])];
    expect(evalRows.filter((row) => synthHashes.has(fingerprintRow(row)))).toEqual([]);
  });

  it("leaves absent splits absent", () => {
    const merged = mergeAugmented({ train, val: null, test: null, synth, policy: "all" });

    expect(merged.val).toBeNull();
    expect(merged.test).toBeNull();
    expect(merged.train).toHaveLength(6);
  });

  it("assigns a dense index in final order to every pool", () => {
    const merged = mergeAugmented({ train, val, test, synth });

    for (const pool of [merged.train, merged.val ?? [], merged.test ?? []]) {
      expect(pool.map((row) => row.index)).toEqual(pool.map((_, position) => position));
      for (const row of pool) {
        expect(IndexedRowSchema.safeParse(row).success).toBe(true);
      }
    }
  });
});

describe("finalizePool", () => {
  it("drops rows with empty code before indexing", () => {
    const pool = finalizePool([makeRow("int a;", 1), makeRow("  ", 0), makeRow("int b;", 0)]);

    expect(pool.map((row) => [row.index, row.processed_func])).toEqual([
      [0, "int a;"],
      [1, "int b;"],
    ]);
  });

  it("puts the index first", () => {
    expect(Object.keys(assignIndex([makeRow("x", 0)])[0])[0]).toBe("index");
  });
});
