import { describe, expect, test } from "vitest";

import { parseCliOptions } from "./cli";

describe("parseCliOptions", () => {
  test("defaults every flag to false", () => {
    expect(parseCliOptions([], "/tmp/workspace")).toEqual({
      load: false,
      validate: false,
      preview: false,
      help: false,
      version: false,
      themeFile: undefined,
      configPath: undefined,
    });
  });

  test("accepts short flags and resolves the theme path", () => {
    const options = parseCliOptions(["-v", "-t", "themes.d/nord"], "/tmp/workspace");
    expect(options.validate).toBe(true);
    expect(options.themeFile).toBe("/tmp/workspace/themes.d/nord");
  });

  test("accepts long flags", () => {
    const options = parseCliOptions(
      ["--load", "--theme", "/etc/hue/nord", "--config", "conf/hue.json", "--preview"],
      "/tmp/workspace",
    );
    expect(options.load).toBe(true);
    expect(options.preview).toBe(true);
    expect(options.themeFile).toBe("/etc/hue/nord");
    expect(options.configPath).toBe("/tmp/workspace/conf/hue.json");
  });

  test("rejects unknown arguments", () => {
    expect(() => parseCliOptions(["--mode", "tui"], "/tmp/workspace")).toThrow();
  });

  test("rejects an empty theme path", () => {
    expect(() => parseCliOptions(["--theme", "  "], "/tmp/workspace")).toThrow(
      "Invalid --theme",
    );
  });

  test("requires --load for a preview of an explicit theme", () => {
    expect(() => parseCliOptions(["-p", "-t", "nord"], "/tmp/workspace")).toThrow(
      "Invalid --preview",
    );
  });
});
