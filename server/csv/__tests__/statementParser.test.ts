import { describe, it, expect } from "vitest";
import { FormatError } from "../../errors.js";
import { parseCsvLine, parseCsvRecords } from "../csvLine.js";
import { findBlockEnd, findHeaderIndex, parseStatement } from "../statementParser.js";

const HEADER =
  "Fecha de Transacción,Referencia de Transacción,Código de Transacción,Descripción de Transacción,Débito de Transacción,Crédito de Transacción,Balance de Transacción";

const PREAMBLE = [
  "Número de Cliente,Nombre,Producto,Moneda",
  "100200300,CLIENTE DE PRUEBA,CUENTA DE AHORROS,CRC",
  "",
  "Saldo Disponible,Saldo Retenido",
  "500000.00,0.00",
  "",
];

const SUMMARY = [
  "",
  "Resumen de Estado Bancario",
  "Saldo Inicial,Total Débitos,Total Créditos,Saldo Final",
  "500000.00,15000.00,0.00,485000.00",
];

function dataLine(day: number, description: string, debit = "1000.00", credit = ""): string {
  const dd = String(day).padStart(2, "0");
  return `${dd}/03/2024,00${day},TR,${description},${debit},${credit},0.00`;
}

function statement(dataLines: string[], trailer: string[] = SUMMARY): string {
  return [...PREAMBLE, HEADER, ...dataLines, ...trailer].join("\n");
}

// ============================================================================
// parseCsvLine Tests
// ============================================================================

describe("parseCsvLine", () => {
  it("splits on commas", () => {
    expect(parseCsvLine("a,b,c")).toEqual(["a", "b", "c"]);
  });

  it("keeps empty fields including a trailing one", () => {
    expect(parseCsvLine("01/03/2024,Pago,15000.00,")).toEqual(["01/03/2024", "Pago", "15000.00", ""]);
  });

  it("skips whitespace after a delimiter", () => {
    expect(parseCsvLine("a,  b,\tc")).toEqual(["a", "b", "c"]);
  });

  it("keeps trailing whitespace inside a field", () => {
    expect(parseCsvLine("a ,b")).toEqual(["a ", "b"]);
  });

  it("handles quoted fields with commas and escaped quotes", () => {
    expect(parseCsvLine('"PAGO, TARJETA","Dijo ""hola"""')).toEqual(["PAGO, TARJETA", 'Dijo "hola"']);
  });

  it("treats a quote inside an unquoted field as a literal character", () => {
    expect(parseCsvLine('01/03/2024,COMPRA TV 55" SALA,150000.00,')).toEqual([
      "01/03/2024",
      'COMPRA TV 55" SALA',
      "150000.00",
      "",
    ]);
  });

  it("opens a quoted field after skipped whitespace", () => {
    expect(parseCsvLine('a, "b, c"')).toEqual(["a", "b, c"]);
  });
});

describe("parseCsvRecords", () => {
  it("splits records on newlines", () => {
    expect(parseCsvRecords("a,b\nc,d")).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });

  it("keeps a newline inside a quoted field", () => {
    expect(parseCsvRecords('a,"linea 1\nlinea 2",b\nc,d,e')).toEqual([
      ["a", "linea 1\nlinea 2", "b"],
      ["c", "d", "e"],
    ]);
  });
});

// ============================================================================
// findHeaderIndex / findBlockEnd Tests
// ============================================================================

describe("findHeaderIndex", () => {
  it("finds the accented header marker", () => {
    expect(findHeaderIndex(["x", "y", HEADER])).toBe(2);
  });

  it("finds the unaccented header marker", () => {
    expect(findHeaderIndex(["x", "Fecha de Transaccion,Descripcion de Transaccion"])).toBe(1);
  });

  it("returns -1 when no line has the marker", () => {
    expect(findHeaderIndex(["Fecha,Descripcion", "01/03/2024,Pago"])).toBe(-1);
  });

  it("takes the first line containing the marker", () => {
    expect(findHeaderIndex(["Nota: Fecha de Transacción en hora local", HEADER])).toBe(0);
  });
});

describe("findBlockEnd", () => {
  it("stops at a summary marker", () => {
    const lines = [HEADER, dataLine(1, "A"), "Resumen de Estado Bancario", "x"];
    expect(findBlockEnd(lines, 0)).toBe(2);
  });

  it("ignores a blank line before ten data lines", () => {
    const lines = [HEADER, dataLine(1, "A"), "", dataLine(2, "B")];
    expect(findBlockEnd(lines, 0)).toBe(4);
  });

  it("stops at a blank line after ten data lines", () => {
    const data = Array.from({ length: 10 }, (_, i) => dataLine(i + 1, `Compra ${i + 1}`));
    const lines = [HEADER, ...data, "", "Otra seccion,sin marcador"];
    expect(findBlockEnd(lines, 0)).toBe(11);
  });

  it("runs to end of input without a terminator", () => {
    const lines = [HEADER, dataLine(1, "A"), dataLine(2, "B")];
    expect(findBlockEnd(lines, 0)).toBe(3);
  });
});

// ============================================================================
// parseStatement Tests
// ============================================================================

describe("parseStatement", () => {
  it("returns one row per transaction line and the matching count", () => {
    const result = parseStatement(
      statement([dataLine(1, "Supermercado ABC"), dataLine(2, "Farmacia"), dataLine(3, "Gasolinera")])
    );

    expect(result.rows).toHaveLength(3);
    expect(result.count).toBe(3);
  });

  it("maps cells to trimmed header names", () => {
    const result = parseStatement(statement([dataLine(1, "Supermercado ABC", "15000.00", "")]));

    expect(result.columns).toEqual([
      "Fecha de Transacción",
      "Referencia de Transacción",
      "Código de Transacción",
      "Descripción de Transacción",
      "Débito de Transacción",
      "Crédito de Transacción",
      "Balance de Transacción",
    ]);
    expect(result.rows[0]).toEqual({
      "Fecha de Transacción": "01/03/2024",
      "Referencia de Transacción": "001",
      "Código de Transacción": "TR",
      "Descripción de Transacción": "Supermercado ABC",
      "Débito de Transacción": "15000.00",
      "Crédito de Transacción": "",
      "Balance de Transacción": "0.00",
    });
  });

  it("throws FormatError when there is no transaction header", () => {
    expect(() => parseStatement("Fecha,Descripcion\n01/03/2024,Pago")).toThrow(FormatError);
  });

  it("reports the missing header in the error message", () => {
    expect(() => parseStatement("")).toThrow("no transaction header located");
  });

  it("handles CRLF line endings and a byte-order mark", () => {
    const text = "\uFEFF" + [HEADER, dataLine(1, "A"), dataLine(2, "B")].join("\r\n") + "\r\n";
    const result = parseStatement(text);

    expect(result.count).toBe(2);
    expect(result.rows[1]["Descripción de Transacción"]).toBe("B");
  });

  it("keeps reading past an early blank line", () => {
    const result = parseStatement(statement([dataLine(1, "A"), dataLine(2, "B"), "", dataLine(3, "C")]));

    expect(result.count).toBe(3);
    expect(result.rows.map((r) => r["Descripción de Transacción"])).toEqual(["A", "B", "C"]);
  });

  it("ends the block at a blank line after ten transactions", () => {
    const data = Array.from({ length: 12 }, (_, i) => dataLine(i + 1, `Compra ${i + 1}`));
    const result = parseStatement(statement(data, ["", "Otra seccion,sin marcador", "1,2"]));

    expect(result.count).toBe(12);
    expect(result.rows[11]["Descripción de Transacción"]).toBe("Compra 12");
  });

  it("stops at a summary line that follows the data directly", () => {
    const result = parseStatement(statement([dataLine(1, "A")], ["Saldo Inicial,500000.00"]));

    expect(result.count).toBe(1);
  });

  it("returns an empty table when the header has no transactions", () => {
    const result = parseStatement(statement([]));

    expect(result.rows).toEqual([]);
    expect(result.count).toBe(0);
    expect(result.columns).toHaveLength(7);
  });

  it("trims header fields and skips unnamed columns", () => {
    const text = " Fecha de Transacción , Descripción de Transacción ,\n01/03/2024, Pago de luz,extra";
    const result = parseStatement(text);

    expect(result.columns).toEqual(["Fecha de Transacción", "Descripción de Transacción", ""]);
    expect(result.rows[0]).toEqual({
      "Fecha de Transacción": "01/03/2024",
      "Descripción de Transacción": "Pago de luz",
    });
  });

  it("fills missing trailing cells with empty strings", () => {
    const text = "Fecha de Transacción,Descripción de Transacción,Débito de Transacción\n01/03/2024,Pago";
    const result = parseStatement(text);

    expect(result.rows[0]["Débito de Transacción"]).toBe("");
  });

  it("keeps commas inside quoted descriptions", () => {
    const result = parseStatement(statement(['01/03/2024,001,TR,"PAGO, TARJETA",100.00,,0.00']));

    expect(result.rows[0]["Descripción de Transacción"]).toBe("PAGO, TARJETA");
    expect(result.rows[0]["Débito de Transacción"]).toBe("100.00");
  });

  it("keeps the following cells of a description with a stray quote", () => {
    const result = parseStatement(statement(['01/03/2024,001,TR,COMPRA TV 55" SALA,150000.00,,0.00']));

    expect(result.rows[0]["Descripción de Transacción"]).toBe('COMPRA TV 55" SALA');
    expect(result.rows[0]["Débito de Transacción"]).toBe("150000.00");
    expect(result.rows[0]["Balance de Transacción"]).toBe("0.00");
  });

  it("reads a quoted description spanning two lines as one transaction", () => {
    const result = parseStatement(
      statement(['01/03/2024,001,TR,"PAGO SERVICIOS', 'AGUA Y LUZ",2000.00,,0.00', dataLine(2, "Farmacia")])
    );

    expect(result.count).toBe(2);
    expect(result.rows[0]["Descripción de Transacción"]).toBe("PAGO SERVICIOS\nAGUA Y LUZ");
    expect(result.rows[0]["Débito de Transacción"]).toBe("2000.00");
    expect(result.rows[1]["Descripción de Transacción"]).toBe("Farmacia");
  });
});
