import { describe, expect, it } from "vitest";
import { formatArgv, quoteArg, splitCommand } from "../../src/argv";

describe("quoteArg", () => {
  it("leaves plain words alone", () => {
    expect(quoteArg("./report.py")).toBe("./report.py");
    expect(quoteArg("--flag=1")).toBe("--flag=1");
  });

  it("quotes empty strings and whitespace", () => {
    expect(quoteArg("")).toBe('""');
    expect(quoteArg("two words")).toBe('"two words"');
  });

  it("escapes quotes and backslashes inside quotes", () => {
    expect(quoteArg('say "hi"')).toBe('"say \\"hi\\""');
    expect(quoteArg("a\\b")).toBe('"a\\\\b"');
  });
});

describe("splitCommand", () => {
  it("splits on whitespace", () => {
    expect(splitCommand("  uv   run ./report.py ")).toEqual(["uv", "run", "./report.py"]);
  });

  it("honours quotes and escapes", () => {
    expect(splitCommand(`uv run "./my script.py" --flag='x y' a\\ b`)).toEqual([
      "uv",
      "run",
      "./my script.py",
      "--flag=x y",
      "a b",
    ]);
  });

  it("keeps empty quoted arguments", () => {
    expect(splitCommand('echo "" end')).toEqual(["echo", "", "end"]);
  });

  it("returns undefined for an unterminated quote", () => {
    expect(splitCommand('echo "unterminated')).toBeUndefined();
    expect(splitCommand("echo 'half")).toBeUndefined();
  });

  it("returns an empty list for blank input", () => {
    expect(splitCommand("   ")).toEqual([]);
  });

  it("reads back what formatArgv writes", () => {
    const argv = ["printf", "%s\\n", "it's", "", 'a "quoted" word', "tab\there"];
    expect(splitCommand(formatArgv(argv))).toEqual(argv);
  });
});
