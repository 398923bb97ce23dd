/**
 * Theme file contracts.
 *
 * A theme is an immutable, ordered list of named attributes loaded from one
 * file. Values are kept as written; callers decide which ones are colors.
 */

export type ThemeAttribute = readonly [name: string, value: string];

export type Theme = {
  readonly path: string;
  readonly name: string;
  listAttributes: () => readonly ThemeAttribute[];
  get: (name: string) => string | undefined;
};
