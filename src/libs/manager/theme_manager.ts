import { join } from "node:path";

import type { ResolvedHueConfig } from "../../types/config";
import { ManifestVerifier, type ManifestVerification } from "../manifest";
import { loadTheme, type Theme } from "../theme";
import type { Logger } from "../utils/logger";

export class ThemeValidationError extends Error {
  readonly themeFilePath: string;
  readonly verification: ManifestVerification;

  constructor(verification: ManifestVerification) {
    super(`Failed to validate theme: ${verification.themeFilePath}`);
    this.name = "ThemeValidationError";
    this.themeFilePath = verification.themeFilePath;
    this.verification = verification;
  }
}

export type ThemeManager = {
  readonly config: ResolvedHueConfig;
  readonly manifestPath: string;
  resolveThemePath: (themeFile?: string) => string;
  inspectTheme: (themeFile?: string) => ManifestVerification;
  validateTheme: (themeFile?: string) => boolean;
  loadTheme: (themeFile?: string) => Theme;
  loadVerifiedTheme: (themeFile?: string) => Theme;
};

/**
 * Bind config and logger into a theme handle. Nothing is read until a method
 * is called, and every verification reads the MANIFEST afresh.
 */
export const createThemeManager = (
  config: ResolvedHueConfig,
  logger: Logger,
): ThemeManager => {
  const manifestPath = join(config.themesDir, config.manifestFile);
  const verifier = new ManifestVerifier({
    themesDir: config.themesDir,
    log: logger.info,
    warn: logger.warn,
    error: logger.error,
  });

  const resolveThemePath = (themeFile?: string) =>
    themeFile ?? join(config.themesDir, config.defaultTheme);

  const inspectTheme = (themeFile?: string) =>
    verifier.inspect(resolveThemePath(themeFile), manifestPath);

  const load = (themeFile?: string) => {
    const themePath = resolveThemePath(themeFile);
    const theme = loadTheme(themePath);
    logger.info(`Loaded theme from file: ${themePath}`);
    return theme;
  };

  return {
    config,
    manifestPath,
    resolveThemePath,
    inspectTheme,
    validateTheme: (themeFile) => inspectTheme(themeFile).ok,
    loadTheme: load,
    loadVerifiedTheme: (themeFile) => {
      const verification = inspectTheme(themeFile);
      if (!verification.ok) {
        throw new ThemeValidationError(verification);
      }
      logger.info(`Theme validated: ${verification.themeFilePath}`);
      return load(themeFile);
    },
  };
};
