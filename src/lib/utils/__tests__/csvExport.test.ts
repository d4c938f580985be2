import { describe, it, expect } from "vitest";
import type { SummaryTable } from "@/types/summary";
import { generateSummaryCsv } from "../csvExport";

describe("generateSummaryCsv", () => {
  it("writes a header row and one row per symbol", () => {
    const table: SummaryTable = {
      index: ["AAPL", "KO"],
      columns: ["name", "open", "earningsDate"],
      rows: [
        ["Apple Inc.", 188.9, "2026-07-27"],
        ['The "Coca-Cola" Company', null, null],
      ],
    };

    expect(generateSummaryCsv(table)).toBe(
      [
        `"symbol","name","open","earningsDate"`,
        `"AAPL","Apple Inc.",188.9,"2026-07-27"`,
        `"KO","The ""Coca-Cola"" Company",,`,
      ].join("\n")
    );
  });
});
