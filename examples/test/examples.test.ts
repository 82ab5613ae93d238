// These example scripts are exercised by the test run to help ensure they
// stay correct for downstream users.
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { runStackingDemo } from "../stacking_demo.ts";
import { runTransactionDemo } from "../transaction_demo.ts";
import { makeTempDir } from "../../src/test/test_helpers.ts";

describe("examples", () => {
  it("transaction_demo rolls back then commits nested deposits", () => {
    expect(runTransactionDemo()).toEqual([
      "Account Balance: $1000 -> $1500",
      "Account Balance: $1000",
      "Account Balance: $1000",
      "Account Balance: $1000 -> $1200 -> $1250",
    ]);
  });

  it("stacking_demo only publishes committed rows", () => {
    const { dir, cleanup } = makeTempDir();
    try {
      expect(runStackingDemo(join(dir, "rows.txt"))).toEqual({
        afterRollback: "header\n",
        afterCommit: "header\nfinal row\n",
      });
    } finally {
      cleanup();
    }
  });
});
