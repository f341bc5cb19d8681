/**
 * Reads factor definitions and responses from JSON, CSV or Excel (.xlsx) files.
 * Tables: first worksheet, first row = headers (matched case-insensitively).
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import * as XLSX from "xlsx";
import { z, type ZodIssue, type ZodTypeAny } from "zod";
import {
  FactorSchema,
  QuestionnaireAnswersSchema,
  ResponseListSchema,
  ResponseMapSchema,
  type Factor,
  type QuestionnaireAnswers,
  type Response,
} from "../domain/assessment/assessment.schema";
import { FileAccessError, ValidationError, type ValidationErrorKind } from "../domain/assessment/assessment.errors";
import { dlog, dwarn } from "./debug";

export type TableRow = {
  /** 1-based worksheet row (the header is row 1). */
  rowNumber: number;
  cells: Record<string, string>;
};

export type ParsedTable = {
  headers: string[];
  rows: TableRow[];
};

export type InputDocument = { format: "json"; data: unknown } | { format: "table"; table: ParsedTable };

/** Responses as read from a file: flat per-factor scores, or questionnaire answers. */
export type ResponseInput =
  | { kind: "responses"; responses: Response[] }
  | { kind: "questionnaire"; answers: QuestionnaireAnswers };

const TABLE_EXTENSIONS = new Set([".csv", ".xlsx", ".xls"]);

function isRowEmpty(cells: unknown[]): boolean {
  return cells.every((c) => c === undefined || c === null || String(c).trim() === "");
}

/**
 * Parse the first worksheet of a workbook (xlsx or csv bytes).
 * - Header cells are trimmed and lower-cased; blanks become `column<N>`
 * - Cells hold underlying values, not display text, so number formats never round
 * - Completely empty rows are omitted
 */
export function parseTable(data: Buffer): ParsedTable {
  const workbook = XLSX.read(data, { type: "buffer" });
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) {
    throw new Error("Workbook has no worksheets");
  }
  const sheet = workbook.Sheets[firstSheetName];
  if (!sheet) {
    throw new Error("First worksheet could not be read");
  }
  // header: 1 => array of arrays; first row = headers
  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: true,
    blankrows: true,
  });

  if (!raw.length) {
    return { headers: [], rows: [] };
  }

  const headerRow = raw[0] ?? [];
  const headers = headerRow.map((h, j) => String(h ?? "").trim().toLowerCase() || `column${j}`);

  const rows: TableRow[] = [];
  for (let i = 1; i < raw.length; i++) {
    const cellRow = raw[i] ?? [];
    if (isRowEmpty(cellRow)) continue;
    const cells: Record<string, string> = {};
    headers.forEach((key, j) => {
      const value = cellRow[j];
      cells[key] = value === undefined || value === null ? "" : String(value).trim();
    });
    rows.push({ rowNumber: i + 1, cells });
  }
  return { headers, rows };
}

/** Read and decode an input file by extension (.json, .csv, .xlsx, .xls). */
export async function readInputFile(filePath: string): Promise<InputDocument> {
  const ext = path.extname(filePath).toLowerCase();
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (err) {
    throw new FileAccessError(filePath, "could not be read", { cause: err });
  }

  if (ext === ".json") {
    try {
      return { format: "json", data: JSON.parse(data.toString("utf8")) };
    } catch (err) {
      throw new FileAccessError(filePath, "is not valid JSON", { cause: err });
    }
  }
  if (TABLE_EXTENSIONS.has(ext)) {
    try {
      const table = parseTable(data);
      if (table.rows.length === 0) dwarn("[import] table has no data rows", { filePath });
      dlog("[import] table", { filePath, headers: table.headers, rowCount: table.rows.length });
      return { format: "table", table };
    } catch (err) {
      throw new FileAccessError(filePath, "could not be parsed as a worksheet", { cause: err });
    }
  }
  throw new FileAccessError(filePath, `unsupported file type "${ext || "(none)"}"; use .json, .csv or .xlsx`);
}

function issuePath(issue: ZodIssue): string {
  return issue.path.map((p) => (typeof p === "number" ? `[${p}]` : `.${p}`)).join("").replace(/^\./, "");
}

function joinField(prefix: string | undefined, rel: string): string | undefined {
  if (!prefix) return rel || undefined;
  if (!rel) return prefix;
  return rel.startsWith("[") ? `${prefix}${rel}` : `${prefix}.${rel}`;
}

/**
 * Parse with a zod schema; the first issue becomes a ValidationError whose
 * field is the issue path (prefixed with `fieldPrefix`).
 */
export function parseWithSchema<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
  fieldPrefix?: string,
  kindFor: (field: string) => ValidationErrorKind = () => "MalformedInput"
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const rel = issue ? issuePath(issue) : "";
  const field = joinField(fieldPrefix, rel);
  const kind = kindFor(rel);
  throw new ValidationError(kind, `${field ?? "input"}: ${issue?.message ?? "invalid value"}`, field, {
    issues: result.error.issues,
  });
}

function findColumn(headers: string[], candidates: string[]): string | undefined {
  return candidates.find((c) => headers.includes(c));
}

function requireColumn(table: ParsedTable, candidates: string[]): string {
  const column = findColumn(table.headers, candidates);
  if (column === undefined) {
    throw new ValidationError(
      "MalformedInput",
      `Table needs a "${candidates[0]}" column (found: ${table.headers.join(", ") || "none"})`,
      candidates[0]
    );
  }
  return column;
}

function numericCell(row: TableRow, column: string): number {
  const text = row.cells[column] ?? "";
  const n = Number(text);
  if (text === "" || Number.isNaN(n)) {
    throw new ValidationError(
      "MalformedInput",
      `Row ${row.rowNumber}: "${column}" must be a number, got "${text}"`,
      `row ${row.rowNumber}.${column}`
    );
  }
  return n;
}

function textCell(row: TableRow, column: string): string {
  const text = row.cells[column] ?? "";
  if (text === "") {
    throw new ValidationError("MalformedInput", `Row ${row.rowNumber}: "${column}" is empty`, `row ${row.rowNumber}.${column}`);
  }
  return text;
}

/** Factor table: columns `name` (or `factor`), `weight`, optional `label`. */
export function factorsFromTable(table: ParsedTable): Factor[] {
  const nameCol = requireColumn(table, ["name", "factor"]);
  const weightCol = requireColumn(table, ["weight"]);
  const labelCol = findColumn(table.headers, ["label", "description"]);
  return table.rows.map((row) => {
    const label = labelCol !== undefined ? row.cells[labelCol] : undefined;
    return {
      name: textCell(row, nameCol),
      weight: numericCell(row, weightCol),
      ...(label ? { label } : {}),
    };
  });
}

/** Response table: columns `factor` (or `name`), `score` (or `raw_score`). */
export function responsesFromTable(table: ParsedTable): Response[] {
  const factorCol = requireColumn(table, ["factor", "name"]);
  const scoreCol = requireColumn(table, ["score", "raw_score", "rawscore"]);
  return table.rows.map((row) => ({
    factor: textCell(row, factorCol),
    rawScore: numericCell(row, scoreCol),
  }));
}

const FactorFileSchema = z.union([z.array(FactorSchema), z.object({ factors: z.array(FactorSchema) })]);

/** JSON factor file: an array of factors, or `{ factors: [...] }`. */
export function factorsFromJson(data: unknown): Factor[] {
  const parsed = parseWithSchema(FactorFileSchema, data, undefined, () => "InvalidFactorDefinition");
  return Array.isArray(parsed) ? parsed : parsed.factors;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * JSON responses, by shape:
 * - `[{ factor, score }]` → responses
 * - `{ factor: score }` → responses
 * - `{ factor: { question: score } }` (any nested object) → questionnaire answers
 */
export function responsesFromJson(data: unknown): ResponseInput {
  if (Array.isArray(data)) {
    const list = parseWithSchema(ResponseListSchema, data, "responses");
    return { kind: "responses", responses: list.map((r) => ({ factor: r.factor, rawScore: r.score })) };
  }
  if (isPlainObject(data) && Object.values(data).some(isPlainObject)) {
    return { kind: "questionnaire", answers: parseWithSchema(QuestionnaireAnswersSchema, data, "answers") };
  }
  const map = parseWithSchema(ResponseMapSchema, data, "responses");
  return {
    kind: "responses",
    responses: Object.entries(map).map(([factor, rawScore]) => ({ factor, rawScore })),
  };
}

export async function loadFactors(filePath: string): Promise<Factor[]> {
  const doc = await readInputFile(filePath);
  return doc.format === "json" ? factorsFromJson(doc.data) : factorsFromTable(doc.table);
}

export async function loadResponses(filePath: string): Promise<ResponseInput> {
  const doc = await readInputFile(filePath);
  return doc.format === "json"
    ? responsesFromJson(doc.data)
    : { kind: "responses", responses: responsesFromTable(doc.table) };
}
