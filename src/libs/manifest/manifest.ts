/**
 * MANIFEST file format.
 *
 * One entry per line: `<theme file name><whitespace><sha256 hex digest>`.
 * Blank lines are ignored; there is no comment syntax.
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";

import { ManifestParseError } from "./errors";

export type ManifestEntry = {
  themeFileName: string;
  expectedHash: string;
};

export const computeFileDigest = (filePath: string): string =>
  createHash("sha256").update(readFileSync(filePath)).digest("hex");

/**
 * Returns `undefined` for blank lines and throws `ManifestParseError` unless the
 * line holds exactly two tokens.
 */
export const parseManifestLine = (
  line: string,
  lineNumber: number,
  manifestPath = "MANIFEST",
): ManifestEntry | undefined => {
  const trimmed = line.trim();
  if (trimmed === "") {
    return undefined;
  }

  const tokens = trimmed.split(/\s+/);
  const [themeFileName, expectedHash] = tokens;
  if (tokens.length !== 2 || themeFileName === undefined || expectedHash === undefined) {
    throw new ManifestParseError({ manifestPath, lineNumber, line });
  }

  return { themeFileName, expectedHash };
};

export const splitManifestLines = (content: string): string[] => content.split(/\r?\n/);
