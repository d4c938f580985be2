import { describe, it, expect } from "vitest";
import { getPositionalArgs, hasFlag, parseFlag, parseIntFlag } from "../cli";

describe("cli", () => {
  describe("parseFlag", () => {
    it("reads --flag value and --flag=value", () => {
      expect(parseFlag(["--csv", "out.csv"], "--csv")).toBe("out.csv");
      expect(parseFlag(["--csv=out.csv"], "--csv")).toBe("out.csv");
    });

    it("returns undefined when the value is another flag", () => {
      expect(parseFlag(["--csv", "--json"], "--csv")).toBeUndefined();
    });
  });

  describe("hasFlag", () => {
    it("detects a flag", () => {
      expect(hasFlag(["AAPL", "--threads"], "--threads")).toBe(true);
      expect(hasFlag(["AAPL"], "--threads")).toBe(false);
    });
  });

  describe("parseIntFlag", () => {
    it("parses numbers and falls back to the default", () => {
      expect(parseIntFlag(["--thread-count", "10"], "--thread-count", 5)).toBe(10);
      expect(parseIntFlag(["--thread-count", "many"], "--thread-count", 5)).toBe(5);
      expect(parseIntFlag([], "--thread-count", 5)).toBe(5);
    });
  });

  describe("getPositionalArgs", () => {
    it("collects symbols and skips values of value flags", () => {
      const args = ["AAPL", "--csv", "out.csv", "Beyond Meat", "--threads", "--thread-count=3", "TSLA"];

      expect(getPositionalArgs(args, ["--csv"])).toEqual(["AAPL", "Beyond Meat", "TSLA"]);
    });
  });
});
