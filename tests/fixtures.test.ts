import path from "node:path";
import { isSubsetMatch, renderFixtureText, runFixtures } from "../src/core/fixtures";
import { quietLogger } from "./helpers";

describe("fixtures", () => {
  it("every fixture satisfies its expected report", () => {
    const results = runFixtures(path.resolve(__dirname, "../fixtures"), { logger: quietLogger });

    expect(results.filter((result) => !result.ok)).toEqual([]);
    expect(results.map((result) => result.fixture)).toEqual([
      "C01_FL0021_list_creation",
      "C02_FL0011_concurrent_get_or_add_value",
      "C03_FL0008_work_state_sentinel",
      "C04_FL0014_FL0007_interpolated_strings",
      "C05_PASS_deferred_chain_and_complex_initializer",
      "C06_PASS_generated_source_skipped",
    ]);
  });

  it("renders a summary line per fixture", () => {
    expect(
      renderFixtureText([
        { fixture: "C01", ok: true },
        { fixture: "C02", ok: false, reason: "missing expected.json" },
      ]),
    ).toBe(["Fixtures: total=2 passed=1 failed=1", "- PASS C01", "- FAIL C02 missing expected.json"].join("\n"));
  });
});

describe("isSubsetMatch", () => {
  it("matches nested objects by their expected keys", () => {
    expect(isSubsetMatch({ ok: true, summary: { findings: 2, files: 1 } }, { summary: { findings: 2 } })).toBe(true);
    expect(isSubsetMatch({ ok: true, summary: { findings: 2 } }, { summary: { findings: 3 } })).toBe(false);
    expect(isSubsetMatch({ ok: true }, { missing: undefined })).toBe(false);
  });

  it("matches array items in any order, each at most once", () => {
    expect(isSubsetMatch([{ rule: "A" }, { rule: "B" }], [{ rule: "B" }, { rule: "A" }])).toBe(true);
    expect(isSubsetMatch([{ rule: "A" }], [{ rule: "A" }, { rule: "A" }])).toBe(false);
    expect(isSubsetMatch({ rule: "A" }, [{ rule: "A" }])).toBe(false);
  });
});
