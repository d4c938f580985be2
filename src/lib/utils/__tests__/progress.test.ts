import { describe, it, expect } from "vitest";
import { createProgress } from "../progress";

function memoryStream() {
  const writes: string[] = [];
  return { writes, stream: { write: (chunk: string) => writes.push(chunk) } };
}

describe("createProgress", () => {
  it("renders count and percentage on every advance", () => {
    const { writes, stream } = memoryStream();
    const progress = createProgress(true, 4, "Downloading", stream);

    progress.advance();
    progress.advance();
    progress.done();

    expect(writes).toEqual(["\r  Downloading 0/4 (0%)", "\r  Downloading 1/4 (25%)", "\r  Downloading 2/4 (50%)", "\n"]);
  });

  it("shows 100% for an empty pass", () => {
    const { writes, stream } = memoryStream();
    createProgress(true, 0, "Validating", stream);

    expect(writes).toEqual(["\r  Validating 0/0 (100%)"]);
  });

  it("writes nothing when disabled", () => {
    const { writes, stream } = memoryStream();
    const progress = createProgress(false, 3, "Downloading", stream);

    progress.advance();
    progress.done();

    expect(writes).toEqual([]);
  });
});
