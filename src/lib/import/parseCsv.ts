import { headerLabel, type Cell, type RawTable } from "./types";

export type CsvDelimiter = "," | ";" | "\t";

type RawCell = {
  text: string;
  quoted: boolean;
};

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const integerPattern = /^-?\d+$/;

const candidateDelimiters: CsvDelimiter[] = [",", ";", "\t"];

const sanitizeText = (text: string): string =>
  text
    .replace(/^\uFEFF/, "")
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n");

// Ties go to the earlier candidate, so a header without delimiters reads as comma separated.
const detectDelimiter = (headerLine: string): CsvDelimiter =>
  candidateDelimiters.reduce((best, candidate) =>
    headerLine.split(candidate).length > headerLine.split(best).length ? candidate : best
  );

const splitLine = (line: string, delimiter: CsvDelimiter): RawCell[] => {
  const cells: RawCell[] = [];
  let current: RawCell = { text: "", quoted: false };
  let inQuotes = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === '"') {
      if (inQuotes && line[index + 1] === '"') {
        current.text += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
        current.quoted = true;
      }
      continue;
    }

    if (char === delimiter && !inQuotes) {
      cells.push(current);
      current = { text: "", quoted: false };
      continue;
    }

    current.text += char;
  }

  cells.push(current);
  return cells;
};

// Quoted cells stay text so identifiers such as "0001" keep their leading zeros.
// Integers past 2^53 stay text too, e.g. nanosecond epochs.
const coerceCell = ({ text, quoted }: RawCell): Cell => {
  const trimmed = text.trim();
  if (!trimmed) {
    return null;
  }
  if (!quoted && numericPattern.test(trimmed)) {
    const parsed = Number(trimmed);
    if (integerPattern.test(trimmed) && !Number.isSafeInteger(parsed)) {
      return trimmed;
    }
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return trimmed;
};

const buildHeaders = (rawHeaders: RawCell[]): string[] =>
  rawHeaders.map((header, index) => headerLabel(header.text, index));

export const parseCsvText = (
  text: string,
  options: { delimiter?: CsvDelimiter } = {}
): RawTable => {
  const lines = sanitizeText(text)
    .split("\n")
    .filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    throw new Error("CSV appears to be empty.");
  }

  const delimiter = options.delimiter ?? detectDelimiter(lines[0]);
  const headers = buildHeaders(splitLine(lines[0], delimiter));
  const rows = lines.slice(1).map((line) => {
    const cells = splitLine(line, delimiter);
    return headers.map((_, index) => coerceCell(cells[index] ?? { text: "", quoted: false }));
  });

  return {
    headers,
    rows
  };
};
