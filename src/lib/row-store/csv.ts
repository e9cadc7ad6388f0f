/**
 * CSV encoding for the file-backed row store
 *
 * Fields containing commas, quotes or line breaks are quoted; embedded quotes
 * are doubled. Cells are kept exactly as written (no trimming).
 */

/**
 * Parses CSV content into rows, handling quotes, commas and quoted newlines
 */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        // Handle escaped quotes ("")
        if (content[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(current);
      current = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && content[i + 1] === "\n") i++;
      row.push(current);
      rows.push(row);
      row = [];
      current = "";
    } else {
      current += char;
    }
  }

  // trailing line without a final newline
  if (current !== "" || row.length > 0) {
    row.push(current);
    rows.push(row);
  }

  return rows;
}

function formatField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(row: readonly string[]): string {
  return row.map(formatField).join(",");
}

export function formatCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => formatCsvRow(row) + "\n").join("");
}
