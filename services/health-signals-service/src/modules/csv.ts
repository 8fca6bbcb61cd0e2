/**
 * Split one CSV line, honouring double-quoted fields and "" escapes.
 */
export function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === "," && !inQuotes) {
      values.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }
  values.push(current.trim());

  return values;
}

/**
 * Rows keyed by lower-cased header name. Blank lines are dropped.
 */
export function parseCsv(text: string): { header: string[]; rows: Record<string, string>[] } {
  const lines = text.split(/\r?\n/).filter((line) => line.trim());
  if (!lines.length) return { header: [], rows: [] };

  const header = parseCsvLine(lines[0]).map((name) => name.toLowerCase());
  const rows = lines.slice(1).map((line) => {
    const values = parseCsvLine(line);
    const row: Record<string, string> = {};
    header.forEach((name, idx) => {
      row[name] = values[idx] ?? "";
    });
    return row;
  });

  return { header, rows };
}
