import { resolve } from "node:path";
import { parseArgs } from "node:util";

export type CliOptions = {
  load: boolean;
  validate: boolean;
  preview: boolean;
  help: boolean;
  version: boolean;
  themeFile?: string;
  configPath?: string;
};

export const parseCliOptions = (argv: string[], startupCwd: string): CliOptions => {
  let values: {
    load?: boolean;
    validate?: boolean;
    preview?: boolean;
    help?: boolean;
    version?: boolean;
    theme?: string;
    config?: string;
  };
  try {
    values = parseArgs({
      args: argv,
      options: {
        load: { type: "boolean", short: "l" },
        validate: { type: "boolean", short: "v" },
        preview: { type: "boolean", short: "p" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean" },
        theme: { type: "string", short: "t" },
        config: { type: "string", short: "c" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    const message =
      error instanceof Error
        ? error.message
        : "Invalid CLI arguments. Supported arguments: --load, --validate, --theme, --config, --preview";
    throw new Error(message);
  }

  const theme = values.theme?.trim();
  if (theme === "") {
    throw new Error("Invalid --theme. It must be a non-empty path");
  }

  if (values.preview && !values.load && theme) {
    throw new Error("Invalid --preview. Combine it with --load when --theme is given");
  }

  return {
    load: values.load ?? false,
    validate: values.validate ?? false,
    preview: values.preview ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
    themeFile: theme ? resolve(startupCwd, theme) : undefined,
    configPath: values.config ? resolve(startupCwd, values.config) : undefined,
  };
};
