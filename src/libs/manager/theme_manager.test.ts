import { describe, expect, test } from "vitest";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { resolveHueConfig } from "../config";
import { computeFileDigest } from "../manifest";
import { createMemoryLogger } from "../utils/logger";
import { ThemeValidationError, createThemeManager } from "./theme_manager";

const THEME_CONTENT = JSON.stringify({ foreground: "#f8f8f2", background: "#272822" });

const createWorkspace = () => {
  const cwd = mkdtempSync(join(tmpdir(), "hue-manager-test-"));
  const config = resolveHueConfig({}, cwd);
  mkdirSync(config.themesDir);
  const themePath = join(config.themesDir, "monokai");
  writeFileSync(themePath, THEME_CONTENT);
  return { cwd, config, themePath };
};

describe("createThemeManager", () => {
  test("resolves the default theme and manifest inside themes_dir", () => {
    const { config, themePath } = createWorkspace();
    const manager = createThemeManager(config, createMemoryLogger());

    expect(manager.resolveThemePath()).toBe(themePath);
    expect(manager.resolveThemePath("/tmp/other")).toBe("/tmp/other");
    expect(manager.manifestPath).toBe(join(config.themesDir, "MANIFEST"));
  });

  test("validateTheme checks the default theme against the manifest", () => {
    const { config, themePath } = createWorkspace();
    writeFileSync(
      join(config.themesDir, "MANIFEST"),
      `monokai ${computeFileDigest(themePath)}\n`,
    );
    const logger = createMemoryLogger();

    expect(createThemeManager(config, logger).validateTheme()).toBe(true);
    expect(logger.entries).toEqual([
      { level: "INFO", message: `Theme ${themePath} matches MANIFEST entry monokai.` },
    ]);
  });

  test("validateTheme logs a missing manifest as an error", () => {
    const { config } = createWorkspace();
    const logger = createMemoryLogger();

    expect(createThemeManager(config, logger).validateTheme()).toBe(false);
    expect(logger.entries[0]?.level).toBe("ERROR");
  });

  test("loadTheme logs the loaded file", () => {
    const { config, themePath } = createWorkspace();
    const logger = createMemoryLogger();

    const theme = createThemeManager(config, logger).loadTheme();

    expect(theme.get("foreground")).toBe("#f8f8f2");
    expect(logger.entries).toEqual([
      { level: "INFO", message: `Loaded theme from file: ${themePath}` },
    ]);
  });

  test("loadVerifiedTheme refuses a tampered theme", () => {
    const { config, themePath } = createWorkspace();
    writeFileSync(join(config.themesDir, "MANIFEST"), `monokai ${"0".repeat(64)}\n`);
    const manager = createThemeManager(config, createMemoryLogger());

    expect(() => manager.loadVerifiedTheme()).toThrow(ThemeValidationError);
    expect(() => manager.loadVerifiedTheme()).toThrow(`Failed to validate theme: ${themePath}`);
  });

  test("loadVerifiedTheme loads a verified theme", () => {
    const { config, themePath } = createWorkspace();
    writeFileSync(
      join(config.themesDir, "MANIFEST"),
      `monokai ${computeFileDigest(themePath)}\n`,
    );

    const theme = createThemeManager(config, createMemoryLogger()).loadVerifiedTheme();

    expect(theme.listAttributes()).toHaveLength(2);
  });
});
