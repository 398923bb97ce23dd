/**
 * Public exports for the theme module.
 */

export type { Theme, ThemeAttribute } from "./core/types";
export type { ThemeFile } from "./core/schema";
export { themeFileSchema } from "./core/schema";
export { ThemeLoadError, createTheme, loadTheme, parseTheme } from "./core/loader";
export { renderThemePreview } from "./core/preview";
