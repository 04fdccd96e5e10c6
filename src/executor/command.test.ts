import { describe, expect, it } from "vitest";
import { checkBackupName, checkConsoleCommand, shellQuote, splitCommandChain } from "./command.ts";

describe("checkConsoleCommand", () => {
  it("accepts ordinary commands", () => {
    expect(checkConsoleCommand('say "hello world"')).toBeNull();
  });

  it("rejects blank commands", () => {
    expect(checkConsoleCommand("  ")).toBe("command is empty");
  });

  it("rejects embedded newlines and other control characters", () => {
    expect(checkConsoleCommand("say hi\nstop")).toBe("command contains control characters");
    expect(checkConsoleCommand("say \x1b[31mred")).toBe("command contains control characters");
  });
});

describe("shellQuote", () => {
  it("leaves safe words alone", () => {
    expect(shellQuote("send-command")).toBe("send-command");
    expect(shellQuote("/usr/bin/docker")).toBe("/usr/bin/docker");
  });

  it("single-quotes words with spaces or metacharacters", () => {
    expect(shellQuote("say hi; rm -rf /")).toBe("'say hi; rm -rf /'");
    expect(shellQuote("$(whoami)")).toBe("'$(whoami)'");
  });

  it("escapes embedded single quotes", () => {
    expect(shellQuote("say it's fine")).toBe("'say it'\\''s fine'");
  });

  it("quotes the empty string", () => {
    expect(shellQuote("")).toBe("''");
  });
});

describe("splitCommandChain", () => {
  it("splits on && and trims each part", () => {
    expect(splitCommandChain("say Saving &&  save-all ")).toEqual(["say Saving", "save-all"]);
  });

  it("drops empty parts", () => {
    expect(splitCommandChain("save-all &&  && list")).toEqual(["save-all", "list"]);
  });

  it("keeps a single command whole", () => {
    expect(splitCommandChain("say a&&b")).toEqual(["say a&&b"]);
  });
});

describe("checkBackupName", () => {
  it("accepts word characters, dots and dashes", () => {
    expect(checkBackupName("auto_20260301_100000")).toBeNull();
    expect(checkBackupName("pre-update.1")).toBeNull();
  });

  it("rejects names with path parts or spaces", () => {
    expect(checkBackupName("a/b")).toBe('invalid backup name "a/b"');
    expect(checkBackupName("a..b")).toBe('invalid backup name "a..b"');
    expect(checkBackupName("my world")).toBe('invalid backup name "my world"');
  });
});
