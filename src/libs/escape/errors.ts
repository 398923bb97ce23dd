export class InvalidColorFormatError extends Error {
  readonly input: string;

  constructor(input: string, message?: string) {
    super(message ?? `Unsupported color format: ${JSON.stringify(input)}. Use HEX or HSL.`);
    this.name = "InvalidColorFormatError";
    this.input = input;
  }
}

export class InvalidColorSpecError extends Error {
  constructor(message?: string) {
    super(
      message ??
        "Invalid color specification. Provide either a color string or RGB tuple.",
    );
    this.name = "InvalidColorSpecError";
  }
}

export class InvalidThemeError extends Error {
  readonly theme: string;

  constructor(theme: string) {
    super(`Unsupported theme "${theme}". Use 'dark' or 'light'.`);
    this.name = "InvalidThemeError";
    this.theme = theme;
  }
}
