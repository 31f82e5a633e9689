import type { CellValue, DataRecord } from './types';

export function parseCSVLine(line: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    const nextChar = line[i + 1];

    if (char === '"') {
      if (inQuotes && nextChar === '"') {
        // Escaped quote
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      // End of field
      result.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current);

  return result;
}

export function parseValue(raw: string): CellValue {
  let value = raw.trim();

  // Remove quotes if present
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    value = value.slice(1, -1).replace(/""/g, '"').trim();
  }

  if (value === '') return null;

  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  // Percentage (e.g., "45.00%")
  if (value.endsWith('%')) {
    const num = Number(value.slice(0, -1).trim());
    if (!isNaN(num)) {
      return num / 100;
    }
  }

  // Currency with possible negative in parentheses (e.g., "$408.30", "$(122.80)")
  const currencyMatch = value.match(/^\$\(?([0-9,]+\.?\d*)\)?$/);
  if (currencyMatch) {
    const num = Number(currencyMatch[1].replace(/,/g, ''));
    if (!isNaN(num)) {
      return value.includes('(') ? -num : num;
    }
  }

  // Plain number (including negatives)
  if (!isNaN(Number(value))) {
    return Number(value);
  }

  return value;
}

/**
 * Parse CSV text with a header row into records, typing each cell.
 */
export function parseCSV(content: string): DataRecord[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length === 0) return [];

  const headers = parseCSVLine(lines[0]).map((header) => header.trim());

  const data: DataRecord[] = [];
  for (let i = 1; i < lines.length; i++) {
    const values = parseCSVLine(lines[i]);

    const row: DataRecord = {};
    headers.forEach((header, index) => {
      row[header] = parseValue(values[index] ?? '');
    });
    data.push(row);
  }

  return data;
}
