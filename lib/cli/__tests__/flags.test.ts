import { describe, it, expect } from "vitest";
import { parseFlags, UsageError } from "../flags";

describe("parseFlags", () => {
  it("collects positionals and option values", () => {
    expect(
      parseFlags(["form.pdf", "--config", "alt.yaml", "--start-page", "2", "--end-page", "3"])
    ).toEqual({
      positional: ["form.pdf"],
      configPath: "alt.yaml",
      startPage: 2,
      endPage: 3,
    });
  });

  it("reads provision options", () => {
    expect(parseFlags(["--location", "westus", "--environment", "forms-dev"])).toEqual({
      positional: [],
      location: "westus",
      environment: "forms-dev",
    });
  });

  it("rejects a page number of 0", () => {
    expect(() => parseFlags(["form.pdf", "--start-page", "0"])).toThrow(
      new UsageError('--start-page expects a page number of at least 1, got "0"')
    );
  });

  it("rejects a page number that is not an integer", () => {
    expect(() => parseFlags(["form.pdf", "--end-page", "abc"])).toThrow(
      new UsageError('--end-page expects a page number of at least 1, got "abc"')
    );
    expect(() => parseFlags(["form.pdf", "--end-page", "1.5"])).toThrow(UsageError);
  });

  it("rejects a trailing option without its value", () => {
    expect(() => parseFlags(["form.pdf", "--config"])).toThrow(
      new UsageError("--config needs a value")
    );
  });

  it("rejects an option followed by another option", () => {
    expect(() => parseFlags(["--output", "--config", "alt.yaml"])).toThrow(
      new UsageError("--output needs a value")
    );
  });

  it("rejects unknown options", () => {
    expect(() => parseFlags(["form.pdf", "--pages", "2"])).toThrow(
      new UsageError("Unknown option: --pages")
    );
  });
});
