import { readFileSync } from "node:fs";

import { loadHueConfig } from "./libs/config";
import { ThemeValidationError, createThemeManager } from "./libs/manager";
import { renderThemePreview, type Theme } from "./libs/theme";
import { parseCliOptions } from "./libs/utils/cli";
import { describeError } from "./libs/utils/errors";
import { createFileLogger } from "./libs/utils/logger";

export const HELP_TEXT = `Usage: hue [options]

Options:
  --help, -h                    Show this help message
  --version                     Show version information
  --theme, -t <path>            Theme file to load or validate
  --load, -l                    Load the theme given by --theme
  --validate, -v                Validate the theme given by --theme against MANIFEST
  --preview, -p                 Print color attributes in their own colors
  --config, -c <path>           Path to config file (default: ./hue.config)

Without --theme, the default theme is validated and loaded.

Examples:
  hue --validate --theme themes.d/monokai
  hue --load --preview --theme themes.d/nord
`;

export const NO_ACTION_HINT =
  "No action specified. Use -l/--load or -v/--validate with -t/--theme.";

export type HueIO = {
  cwd: string;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

const getAppVersion = (): string => {
  try {
    const packageJsonUrl = new URL("../package.json", import.meta.url);
    const packageJson = JSON.parse(readFileSync(packageJsonUrl, "utf8")) as {
      version?: string;
    };
    return packageJson.version ?? "unknown";
  } catch {
    return "unknown";
  }
};

export const formatThemeAttributes = (theme: Theme): string =>
  theme
    .listAttributes()
    .map(([name, value]) => `${name}=${value}`)
    .join(", ");

/**
 * Run the `hue` command and return its exit code.
 */
export const runHue = (argv: string[], io: HueIO): number => {
  try {
    const options = parseCliOptions(argv, io.cwd);

    if (options.help) {
      io.stdout(HELP_TEXT);
      return 0;
    }
    if (options.version) {
      io.stdout(`hue v${getAppVersion()}`);
      return 0;
    }

    const config = loadHueConfig({
      cwd: io.cwd,
      configPath: options.configPath,
      warn: io.stderr,
    });
    const logger = createFileLogger({ filePath: config.logFile });
    const manager = createThemeManager(config, logger);

    const printTheme = (label: string, theme: Theme) => {
      io.stdout(`${label}: ${formatThemeAttributes(theme)}`);
      if (options.preview) {
        for (const line of renderThemePreview(theme)) {
          io.stdout(line);
        }
      }
    };

    if (options.themeFile) {
      const themeFile = options.themeFile;
      if (options.validate) {
        const verification = manager.inspectTheme(themeFile);
        if (!verification.ok) {
          logger.info(`Failed to validate theme: ${themeFile}`);
          throw new ThemeValidationError(verification);
        }
        logger.info(`Theme validated: ${themeFile}`);
        io.stdout(`Theme validated: ${themeFile}`);
        return 0;
      }

      if (options.load) {
        printTheme("Loaded theme", manager.loadTheme(themeFile));
        logger.info(`Loaded theme: ${themeFile}`);
        return 0;
      }

      io.stdout(NO_ACTION_HINT);
      return 0;
    }

    try {
      printTheme("Theme loaded", manager.loadVerifiedTheme());
    } catch (error) {
      if (error instanceof ThemeValidationError) {
        logger.info("Failed to validate theme.");
      }
      throw error;
    }
    return 0;
  } catch (error) {
    if (error instanceof ThemeValidationError && !error.verification.ok) {
      io.stderr(`[hue] ${error.verification.message}`);
    }
    io.stderr(`[hue] ${describeError(error)}`);
    return 1;
  }
};
