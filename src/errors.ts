export class ConfigFileNotFoundError extends Error {
  constructor(
    public configPath: string,
    message?: string,
  ) {
    super(message || `Config file not found: ${configPath}`);
    this.name = "ConfigFileNotFoundError";
  }
}

export class ConfigParseError extends Error {
  constructor(
    public configPath: string,
    public cause?: unknown,
    message?: string,
  ) {
    super(message || `Failed to parse config file: ${configPath}`);
    this.name = "ConfigParseError";
  }
}

export class ConfigValidationError extends Error {
  constructor(
    public issues: string[],
    message?: string,
  ) {
    super(message || `Configuration validation failed: ${issues.join(", ")}`);
    this.name = "ConfigValidationError";
  }
}

export class NoRecordsFoundError extends Error {
  constructor(message?: string) {
    super(message || "No matching records found");
    this.name = "NoRecordsFoundError";
  }
}

export class OffsetOutOfRangeError extends Error {
  constructor(
    public offset: number,
    public totalCount: number,
    message?: string,
  ) {
    super(
      message ||
        `Offset ${offset} exceeds total records (${totalCount}). Max offset: ${totalCount - 1}`,
    );
    this.name = "OffsetOutOfRangeError";
  }
}

export class ImportFileNotFoundError extends Error {
  constructor(
    public filePath: string,
    message?: string,
  ) {
    super(message || `File not found: ${filePath}`);
    this.name = "ImportFileNotFoundError";
  }
}

export class UnsupportedFileFormatError extends Error {
  constructor(
    public filePath: string,
    message?: string,
  ) {
    super(
      message ||
        `Unsupported file format: ${filePath}. Only CSV (.csv) files can be imported`,
    );
    this.name = "UnsupportedFileFormatError";
  }
}

export class MissingColumnsError extends Error {
  constructor(
    public missing: string[],
    public available: string[],
    public required: string[],
    public optional: string[] = [],
    message?: string,
  ) {
    super(
      message ||
        `Missing required columns: ${missing.join(", ")}. ` +
          `Available columns: ${available.join(", ") || "(none)"}. ` +
          `Required: ${required.join(", ")}` +
          (optional.length > 0 ? `. Optional: ${optional.join(", ")}` : ""),
    );
    this.name = "MissingColumnsError";
  }
}

export class InvalidRowError extends Error {
  constructor(
    public row: number,
    public column: string,
    public value: string,
    message?: string,
  ) {
    super(
      message || `Row ${row}: column '${column}' is not a number ('${value}')`,
    );
    this.name = "InvalidRowError";
  }
}

// ANSI color codes
const colors = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  dim: "\u001B[2m",
  red: "\u001B[31m",
};

export function formatError(error: unknown, showStackTrace = false): string {
  const symbol = "✗";

  if (
    error instanceof ConfigFileNotFoundError ||
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof NoRecordsFoundError ||
    error instanceof OffsetOutOfRangeError ||
    error instanceof ImportFileNotFoundError ||
    error instanceof UnsupportedFileFormatError ||
    error instanceof MissingColumnsError ||
    error instanceof InvalidRowError
  ) {
    const errorType = error.name.replace(/Error$/, "");
    const message = error.message;

    let output = `${colors.red}${colors.bold}${symbol} ${errorType}${colors.reset}\n`;
    output += `${colors.dim}${message}${colors.reset}`;

    if (showStackTrace && error.stack) {
      output += `\n\n${colors.dim}${error.stack}${colors.reset}`;
    }

    return output;
  }

  // Unknown error type
  const errorName =
    error instanceof Error ? error.constructor.name : typeof error;
  const errorMessage = error instanceof Error ? error.message : String(error);

  let output = `${colors.red}${colors.bold}${symbol} Unexpected Error: ${errorName}${colors.reset}\n`;
  output += `${colors.dim}${errorMessage}${colors.reset}`;

  if (showStackTrace && error instanceof Error && error.stack) {
    output += `\n\n${colors.dim}${error.stack}${colors.reset}`;
  }

  return output;
}
