/**
 * Parse CSV text into records, handling quoted fields.
 * A quote opens a quoted field only at the start of a field; elsewhere it is
 * a literal character. Quoted fields may span lines. Whitespace right after a
 * delimiter is skipped, so "a, b" yields ["a", "b"].
 */
export function parseCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let values: string[] = [];
  let current = "";
  let inQuotes = false;
  let atFieldStart = true;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    const nextChar = text[i + 1];

    if (inQuotes) {
      if (char === '"' && nextChar === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
      continue;
    }

    if (atFieldStart && (char === " " || char === "\t")) {
      continue;
    }

    if (char === ",") {
      values.push(current);
      current = "";
      atFieldStart = true;
    } else if (char === "\n") {
      values.push(current);
      records.push(values);
      values = [];
      current = "";
      atFieldStart = true;
    } else if (char === '"' && atFieldStart) {
      inQuotes = true;
      atFieldStart = false;
    } else {
      current += char;
      atFieldStart = false;
    }
  }
  values.push(current);
  records.push(values);

  return records;
}

/**
 * Parse a single CSV line
 */
export function parseCsvLine(line: string): string[] {
  return parseCsvRecords(line)[0];
}

/**
 * Quote a value for CSV output when it contains a delimiter, quote or newline
 */
export function formatCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
