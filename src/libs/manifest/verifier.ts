import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";

import { describeError } from "../utils/errors";
import {
  computeFileDigest,
  parseManifestLine,
  splitManifestLines,
  type ManifestEntry,
} from "./manifest";

export type ManifestVerificationFailureReason =
  | "theme-missing"
  | "manifest-unreadable"
  | "theme-unreadable"
  | "hash-mismatch"
  | "not-in-manifest";

export type ManifestVerification =
  | {
      ok: true;
      themeFilePath: string;
      entry: ManifestEntry;
      digest: string;
    }
  | {
      ok: false;
      themeFilePath: string;
      reason: ManifestVerificationFailureReason;
      message: string;
      entry?: ManifestEntry;
      digest?: string;
    };

export type ManifestVerifierOptions = {
  themesDir: string;
  log?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

const noop = (_message: string) => {};

/**
 * Check a theme file against the first MANIFEST entry naming it.
 *
 * Access failures and mismatches come back as `ok: false`; a malformed
 * MANIFEST line reached before the match throws `ManifestParseError`.
 */
export const inspectThemeFile = (
  themeFilePath: string,
  manifestPath: string,
  options: ManifestVerifierOptions,
): ManifestVerification => {
  const warn = options.warn ?? noop;
  const fail = (
    reason: ManifestVerificationFailureReason,
    message: string,
    extra: { entry?: ManifestEntry; digest?: string } = {},
    report = warn,
  ): ManifestVerification => {
    report(message);
    return { ok: false, themeFilePath, reason, message, ...extra };
  };

  if (!existsSync(themeFilePath)) {
    return fail("theme-missing", `Theme file ${themeFilePath} does not exist.`);
  }

  let content: string;
  try {
    content = readFileSync(manifestPath, "utf8");
  } catch (error) {
    return fail(
      "manifest-unreadable",
      `Error reading MANIFEST file: ${describeError(error)}`,
      {},
      options.error ?? warn,
    );
  }

  const target = resolve(themeFilePath);
  const lines = splitManifestLines(content);

  for (const [index, line] of lines.entries()) {
    const entry = parseManifestLine(line, index + 1, manifestPath);
    if (!entry || resolve(join(options.themesDir, entry.themeFileName)) !== target) {
      continue;
    }

    let digest: string;
    try {
      digest = computeFileDigest(themeFilePath);
    } catch (error) {
      return fail(
        "theme-unreadable",
        `Error reading theme file ${themeFilePath}: ${describeError(error)}`,
        { entry },
        options.error ?? warn,
      );
    }

    if (digest !== entry.expectedHash) {
      return fail(
        "hash-mismatch",
        `Theme ${themeFilePath} does not match expected hash.`,
        { entry, digest },
      );
    }

    options.log?.(`Theme ${themeFilePath} matches MANIFEST entry ${entry.themeFileName}.`);
    return { ok: true, themeFilePath, entry, digest };
  }

  return fail("not-in-manifest", `Theme file ${themeFilePath} not found in MANIFEST.`);
};

export const verifyThemeFile = (
  themeFilePath: string,
  manifestPath: string,
  options: ManifestVerifierOptions,
): boolean => inspectThemeFile(themeFilePath, manifestPath, options).ok;

export class ManifestVerifier {
  constructor(private readonly options: ManifestVerifierOptions) {}

  inspect(themeFilePath: string, manifestPath: string): ManifestVerification {
    return inspectThemeFile(themeFilePath, manifestPath, this.options);
  }

  verify(themeFilePath: string, manifestPath: string): boolean {
    return this.inspect(themeFilePath, manifestPath).ok;
  }
}
