import { describe, expect, it } from "vitest";
import { tailLines } from "./daemon.ts";

describe("tailLines", () => {
  it("returns the last lines without the trailing newline", () => {
    expect(tailLines("one\ntwo\nthree\n", 2)).toBe("two\nthree");
  });

  it("returns everything when the file is shorter", () => {
    expect(tailLines("only\n", 50)).toBe("only");
  });
});
