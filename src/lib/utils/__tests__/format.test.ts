import { describe, it, expect } from "vitest";
import { formatChange, formatPrice, formatVolume } from "../format";

describe("format", () => {
  it("formats prices in the quote currency", () => {
    expect(formatPrice(189.84, "USD")).toBe("$189.84");
    expect(formatPrice(null, "USD")).toBe("－");
  });

  it("falls back to plain decimals for an unknown currency", () => {
    expect(formatPrice(1.5, "???")).toBe("1.50");
  });

  it("formats changes with a sign", () => {
    expect(formatChange(0.65)).toBe("+0.65%");
    expect(formatChange(-1.2)).toBe("-1.20%");
  });

  it("abbreviates large numbers", () => {
    expect(formatVolume(2_910_000_000_000)).toBe("2.9T");
    expect(formatVolume(52_345_678)).toBe("52.3M");
    expect(formatVolume(950)).toBe("950");
    expect(formatVolume(null)).toBe("－");
  });
});
