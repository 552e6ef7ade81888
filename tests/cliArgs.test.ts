import { describe, it, expect } from "vitest";
import { parseCliArgs } from "../src/jobs/cliArgs.js";
import { UserInputError } from "../src/errors.js";

describe("parseCliArgs", () => {
  it("should parse the required options with defaults", () => {
    expect(parseCliArgs(["--repo", "acme/widgets", "--pr", "42"])).toEqual({
      repo: { owner: "acme", name: "widgets" },
      prNumber: 42,
      direction: undefined,
      output: undefined,
      update: undefined,
      enhance: true,
      illustrate: true,
      help: false,
    });
  });

  it("should accept --flag=value and the switches", () => {
    const options = parseCliArgs([
      "--repo=acme/widgets",
      "--pr=7",
      "--direction",
      "Focus on the API",
      "--output=posts/cache.md",
      "--no-enhance",
      "--no-image",
    ]);

    expect(options).toMatchObject({
      prNumber: 7,
      direction: "Focus on the API",
      output: "posts/cache.md",
      enhance: false,
      illustrate: false,
    });
  });

  it("should reject a malformed repository", () => {
    expect(() => parseCliArgs(["--repo", "widgets", "--pr", "1"])).toThrow(
      new UserInputError("Invalid repo format: widgets. Expected format: owner/name"),
    );
    expect(() => parseCliArgs(["--repo", "a/b/c", "--pr", "1"])).toThrow(UserInputError);
  });

  it("should reject bad pull request numbers", () => {
    expect(() => parseCliArgs(["--repo", "acme/widgets", "--pr", "abc"])).toThrow(
      "Invalid pull request number: abc",
    );
    expect(() => parseCliArgs(["--repo", "acme/widgets", "--pr", "0"])).toThrow(UserInputError);
  });

  it("should require --repo and --pr unless revising", () => {
    expect(() => parseCliArgs(["--repo", "acme/widgets"])).toThrow(UserInputError);
    expect(parseCliArgs(["--update", "post.md", "--direction", "Shorter"])).toMatchObject({
      update: "post.md",
      direction: "Shorter",
    });
  });

  it("should reject unknown options and missing values", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow("Unknown option: --verbose");
    expect(() => parseCliArgs(["--repo", "acme/widgets", "--pr"])).toThrow(
      "Option --pr requires a value",
    );
    expect(() => parseCliArgs(["stray"])).toThrow("Unexpected argument: stray");
  });

  it("should skip validation when help is requested", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });
});
