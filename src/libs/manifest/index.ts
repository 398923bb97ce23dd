export { ManifestParseError } from "./errors";
export {
  computeFileDigest,
  parseManifestLine,
  splitManifestLines,
  type ManifestEntry,
} from "./manifest";
export {
  ManifestVerifier,
  inspectThemeFile,
  verifyThemeFile,
  type ManifestVerification,
  type ManifestVerificationFailureReason,
  type ManifestVerifierOptions,
} from "./verifier";
