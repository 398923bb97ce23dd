import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import type { HueConfig, ResolvedHueConfig } from "../../types/config";
import {
  DEFAULT_LOG_FILENAME,
  DEFAULT_MANIFEST_FILENAME,
  DEFAULT_THEMES_DIR,
  DEFAULT_THEME_NAME,
  HUE_CONFIG_FILENAME,
} from "./constants";
import { validateHueConfig } from "./validator";

export type LoadHueConfigOptions = {
  cwd: string;
  configPath?: string;
  warn?: (message: string) => void;
};

export const resolveHueConfig = (config: HueConfig, cwd: string): ResolvedHueConfig => ({
  defaultTheme: config.default_theme ?? DEFAULT_THEME_NAME,
  themesDir: resolve(cwd, config.themes_dir ?? DEFAULT_THEMES_DIR),
  manifestFile: config.manifest_file ?? DEFAULT_MANIFEST_FILENAME,
  logFile: resolve(cwd, config.log_file ?? DEFAULT_LOG_FILENAME),
});

/**
 * Read `hue.config` from `cwd` (or `configPath`). A missing default config
 * falls back to built-in values; a missing explicit `configPath` is an error.
 */
export const loadHueConfig = (options: LoadHueConfigOptions): ResolvedHueConfig => {
  const cwd = resolve(options.cwd);
  const filepath = options.configPath
    ? resolve(cwd, options.configPath)
    : resolve(cwd, HUE_CONFIG_FILENAME);

  if (!existsSync(filepath)) {
    if (options.configPath) {
      throw new Error(`Config file not found: ${filepath}`);
    }
    options.warn?.(`[config] ${filepath} not found, using defaults`);
    return resolveHueConfig({}, cwd);
  }

  const content = readFileSync(filepath, "utf8");
  let rawConfig: unknown;

  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in ${filepath}`);
  }

  validateHueConfig(rawConfig);
  return resolveHueConfig(rawConfig, cwd);
};
