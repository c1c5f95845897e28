import { describe, it, expect } from "vitest";
import { DecodeError, FormatError, SchemaError, describeConversionError } from "../errors.js";

describe("describeConversionError", () => {
  it("describes a format error", () => {
    expect(describeConversionError(new FormatError())).toEqual({
      message: "The file doesn't appear to be in the expected BAC format.",
      hint: "Export the statement from BAC online banking as CSV and upload it without editing.",
    });
  });

  it("lists missing and present columns for a schema error", () => {
    expect(describeConversionError(new SchemaError(["Date"], ["Fecha", "Monto"]))).toEqual({
      message: "The statement is missing required columns: Date.",
      hint: "Columns found in the file: Fecha, Monto.",
    });
  });

  it("describes a decode error", () => {
    expect(describeConversionError(new DecodeError(["utf-8"])).message).toBe("The file could not be read as text.");
  });

  it("falls back to the message of an unknown error", () => {
    expect(describeConversionError(new Error("disk full")).message).toBe("Conversion failed: disk full");
    expect(describeConversionError("boom").message).toBe("Conversion failed: boom");
  });
});

describe("conversion errors", () => {
  it("carry their names and details", () => {
    const schema = new SchemaError(["Merchant"], []);

    expect(schema.name).toBe("SchemaError");
    expect(schema.message).toBe("Missing required columns: Merchant (found: none)");
    expect(new FormatError().message).toBe("no transaction header located");
    expect(new DecodeError(["utf-8", "windows-1252"]).attempted).toEqual(["utf-8", "windows-1252"]);
  });
});
