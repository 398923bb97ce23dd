import { readFileSync } from "node:fs";
import { basename } from "node:path";

import { describeError } from "../../utils/errors";
import { themeFileSchema } from "./schema";
import type { Theme, ThemeAttribute } from "./types";

export class ThemeLoadError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Failed to load theme ${path}: ${message}`);
    this.name = "ThemeLoadError";
    this.path = path;
  }
}

export const createTheme = (path: string, attributes: Iterable<ThemeAttribute>): Theme => {
  const entries = Object.freeze(
    Array.from(attributes, ([name, value]) => Object.freeze([name, value] as const)),
  );
  const lookup = new Map(entries);

  return Object.freeze({
    path,
    name: basename(path),
    listAttributes: () => entries,
    get: (name: string) => lookup.get(name),
  });
};

export const parseTheme = (path: string, content: string): Theme => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ThemeLoadError(path, "invalid JSON");
  }

  const parsed = themeFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ThemeLoadError(path, `${where}${issue?.message ?? "invalid theme file"}`);
  }

  return createTheme(path, Object.entries(parsed.data));
};

export const loadTheme = (path: string): Theme => {
  let content: string;
  try {
    content = readFileSync(path, "utf8");
  } catch (error) {
    throw new ThemeLoadError(path, describeError(error));
  }
  return parseTheme(path, content);
};
