import { describe, expect, it } from "vitest";
import { parseConfigValue } from "./config.ts";

describe("parseConfigValue", () => {
  it("parses JSON", () => {
    expect(parseConfigValue('{"mode":"local","container":"bedrock"}')).toEqual({
      mode: "local",
      container: "bedrock",
    });
    expect(parseConfigValue("42")).toBe(42);
  });

  it("keeps anything else as a string", () => {
    expect(parseConfigValue("bedrock")).toBe("bedrock");
  });
});
