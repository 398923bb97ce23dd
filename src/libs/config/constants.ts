export const HUE_CONFIG_FILENAME = "hue.config";

export const DEFAULT_THEME_NAME = "monokai";
export const DEFAULT_THEMES_DIR = "themes.d";
export const DEFAULT_MANIFEST_FILENAME = "MANIFEST";
export const DEFAULT_LOG_FILENAME = "theme.log";

export const HUE_CONFIG_KEYS = [
  "default_theme",
  "themes_dir",
  "manifest_file",
  "log_file",
] as const;
