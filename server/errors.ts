/**
 * Conversion errors
 *
 * Typed errors raised while turning an uploaded statement into Monarch rows.
 * Each one carries a message safe to show on the page and a hint about what
 * the user can do next.
 */

export class ConversionError extends Error {
  /** Message shown to the user */
  readonly userMessage: string;
  /** Follow-up suggestion shown under the message */
  readonly hint: string;

  constructor(message: string, opts: { userMessage: string; hint: string }) {
    super(message);
    this.name = "ConversionError";
    this.userMessage = opts.userMessage;
    this.hint = opts.hint;
  }
}

/** The transaction header line could not be found in the statement text */
export class FormatError extends ConversionError {
  constructor(message = "no transaction header located") {
    super(message, {
      userMessage: "The file doesn't appear to be in the expected BAC format.",
      hint: "Export the statement from BAC online banking as CSV and upload it without editing.",
    });
    this.name = "FormatError";
  }
}

/** Required canonical columns are missing after alias resolution */
export class SchemaError extends ConversionError {
  readonly missing: string[];
  readonly present: string[];

  constructor(missing: string[], present: string[]) {
    super(`Missing required columns: ${missing.join(", ")} (found: ${present.join(", ") || "none"})`, {
      userMessage: `The statement is missing required columns: ${missing.join(", ")}.`,
      hint: `Columns found in the file: ${present.join(", ") || "none"}.`,
    });
    this.name = "SchemaError";
    this.missing = missing;
    this.present = present;
  }
}

/** None of the attempted text encodings could decode the file */
export class DecodeError extends ConversionError {
  readonly attempted: string[];

  constructor(attempted: string[]) {
    super(`Could not decode statement with any of: ${attempted.join(", ")}`, {
      userMessage: "The file could not be read as text.",
      hint: "Make sure you uploaded the CSV export and not a PDF or spreadsheet.",
    });
    this.name = "DecodeError";
    this.attempted = attempted;
  }
}

export interface ErrorDescription {
  message: string;
  hint: string;
}

/**
 * Turn anything thrown during a conversion into text for the page
 */
export function describeConversionError(error: unknown): ErrorDescription {
  if (error instanceof ConversionError) {
    return { message: error.userMessage, hint: error.hint };
  }
  const detail = error instanceof Error ? error.message : String(error);
  return {
    message: `Conversion failed: ${detail}`,
    hint: "Try uploading the file again. If it keeps failing, the export may be damaged.",
  };
}
