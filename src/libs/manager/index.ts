export { ThemeValidationError, createThemeManager, type ThemeManager } from "./theme_manager";
