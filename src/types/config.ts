export type HueConfig = {
  default_theme?: string;
  themes_dir?: string;
  manifest_file?: string;
  log_file?: string;
};

export type ResolvedHueConfig = {
  /** Theme file name inside `themesDir` used when no theme is given. */
  defaultTheme: string;
  themesDir: string;
  /** MANIFEST file name inside `themesDir`. */
  manifestFile: string;
  logFile: string;
};
