export class ManifestParseError extends Error {
  readonly manifestPath: string;
  readonly lineNumber: number;
  readonly line: string;

  constructor(args: { manifestPath: string; lineNumber: number; line: string }) {
    super(
      `Malformed MANIFEST entry at ${args.manifestPath}:${args.lineNumber}: expected "<file> <sha256>", got ${JSON.stringify(args.line)}`,
    );
    this.name = "ManifestParseError";
    this.manifestPath = args.manifestPath;
    this.lineNumber = args.lineNumber;
    this.line = args.line;
  }
}
