import { ValidationError } from "../../shared/errors";
import { numbersClose } from "./answerCompare";
import { scoredOutcome, type HelperOutcome } from "./outcome";

export interface CellRef {
  /** 0-based. */
  column: number;
  /** 0-based. */
  row: number;
}

export type ExpectedCells = Record<string, string | number>;

const CELL_PATTERN = /^([A-Za-z]+)([1-9]\d*)$/;

export function isCellReference(ref: string): boolean {
  return CELL_PATTERN.test(ref.trim());
}

/** "A1" -> { column: 0, row: 0 }; "AA12" -> { column: 26, row: 11 }. */
export function parseCellReference(ref: string): CellRef {
  const match = CELL_PATTERN.exec(ref.trim());
  if (!match) {
    throw new ValidationError("CELL_REFERENCE_INVALID", `'${ref}' is not a cell reference like A1.`);
  }
  let column = 0;
  for (const letter of match[1].toUpperCase()) {
    column = column * 26 + (letter.charCodeAt(0) - 64);
  }
  return { column: column - 1, row: Number(match[2]) - 1 };
}

/**
 * Tab-separated clipboard text as copied from a spreadsheet. Quoted fields
 * may contain tabs, newlines and doubled quotes.
 */
export function parseTsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let index = 0;

  while (index < text.length) {
    const char = text[index];
    if (quoted) {
      if (char === '"' && text[index + 1] === '"') {
        field += '"';
        index += 2;
        continue;
      }
      if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      index += 1;
      continue;
    }
    if (char === '"' && field.length === 0) {
      quoted = true;
    } else if (char === "\t") {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      if (char === "\r" && text[index + 1] === "\n") {
        index += 1;
      }
    } else {
      field += char;
    }
    index += 1;
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

export function cellAt(grid: string[][], ref: string): string {
  const { column, row } = parseCellReference(ref);
  return grid[row]?.[column] ?? "";
}

/** Trimmed text equality, or numeric equality when both sides read as numbers ("15" and "15.0"). */
export function cellValuesMatch(expected: string | number, actual: string): boolean {
  const left = String(expected).trim();
  const right = actual.trim();
  if (left === right) {
    return true;
  }
  const leftNumber = parseNumeric(left);
  const rightNumber = parseNumeric(right);
  return leftNumber !== null && rightNumber !== null && numbersClose(leftNumber, rightNumber);
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Plain decimals only, with optional thousands separators and a leading currency sign. */
export function parseNumeric(value: string): number | null {
  const cleaned = value.replace(/,/g, "").replace(/^[$€£]/, "").trim();
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return null;
  }
  return Number(cleaned);
}

export function scoreCellValues(expected: ExpectedCells, grid: string[][], partialRewarding = true): HelperOutcome {
  const refs = Object.keys(expected);
  if (refs.length === 0) {
    return scoredOutcome(1, { matched: [], mismatched: [] });
  }

  const matched: string[] = [];
  const mismatched: Array<{ cell: string; expected: string | number; actual: string }> = [];
  for (const ref of refs) {
    const actual = cellAt(grid, ref);
    if (cellValuesMatch(expected[ref], actual)) {
      matched.push(ref);
    } else {
      mismatched.push({ cell: ref, expected: expected[ref], actual });
    }
  }

  const ratio = matched.length / refs.length;
  const score = partialRewarding ? ratio : ratio === 1 ? 1 : 0;
  return scoredOutcome(score, { matched, mismatched }, "CELL_MISMATCH");
}
