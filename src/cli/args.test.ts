import { describe, it, expect } from "vitest";
import { parseArgs, stringFlag } from "./args.js";

describe("parseArgs", () => {
  it("separates positional arguments from valued flags", () => {
    expect(parseArgs(["alpha", "Build", "it", "--type", "reviewer"])).toEqual({
      positional: ["alpha", "Build", "it"],
      flags: { type: "reviewer" },
    });
  });

  it("accepts --flag=value", () => {
    expect(parseArgs(["--type=reviewer", "alpha"]).flags).toEqual({ type: "reviewer" });
  });

  it("never gives boolean flags a value", () => {
    expect(parseArgs(["--all", "extra"])).toEqual({ positional: ["extra"], flags: { all: true } });
  });

  it("treats a trailing valued flag as bare", () => {
    const parsed = parseArgs(["alpha", "--type"]);
    expect(parsed.flags).toEqual({ type: true });
    expect(stringFlag(parsed, "type")).toBeUndefined();
  });

  it("stops parsing flags after --", () => {
    expect(parseArgs(["alpha", "--", "--not-a-flag", "text"])).toEqual({
      positional: ["alpha", "--not-a-flag", "text"],
      flags: {},
    });
  });

  it("keeps single-dash arguments positional", () => {
    expect(parseArgs(["-5", "-x"]).positional).toEqual(["-5", "-x"]);
  });
});
