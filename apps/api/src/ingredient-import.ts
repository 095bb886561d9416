import { query } from "./db.js";

export interface IngredientRecord {
  name: string;
  measurementUnit: string;
}

export interface ImportSummary {
  inserted: number;
  skipped: number;
}

export class CsvFormatError extends Error {
  constructor(
    message: string,
    readonly line: number,
  ) {
    super(`line ${line}: ${message}`);
    this.name = "CsvFormatError";
  }
}

/**
 * Splits CSV text into records of fields. Quoted fields may hold commas,
 * newlines and doubled quotes.
 */
export function parseCsv(text: string): { line: number; fields: string[] }[] {
  const records: { line: number; fields: string[] }[] = [];
  let fields: string[] = [];
  let field = "";
  let quoted = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = () => {
    fields.push(field);
    if (fields.length > 1 || fields[0] !== "") records.push({ line: recordLine, fields });
    fields = [];
    field = "";
    recordLine = line;
  };

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (ch === '"') {
        quoted = false;
      } else {
        if (ch === "\n") line += 1;
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field === "") {
      quoted = true;
    } else if (ch === ",") {
      fields.push(field);
      field = "";
    } else if (ch === "\n") {
      line += 1;
      endRecord();
    } else if (ch !== "\r") {
      field += ch;
    }
  }

  if (quoted) throw new CsvFormatError("unterminated quoted field", recordLine);
  endRecord();
  return records;
}

/** `name,measurement_unit` rows, trimmed; repeats within the file are dropped. */
export function parseIngredientCsv(text: string): IngredientRecord[] {
  const seen = new Set<string>();
  const ingredients: IngredientRecord[] = [];
  for (const record of parseCsv(text.replace(/^\uFEFF/, ""))) {
    if (record.fields.length !== 2) {
      throw new CsvFormatError(`expected 2 columns, got ${record.fields.length}`, record.line);
    }
    const name = record.fields[0].trim();
    const measurementUnit = record.fields[1].trim();
    if (!name || !measurementUnit) {
      throw new CsvFormatError("name and measurement unit must not be empty", record.line);
    }

    const key = `${name}\u0000${measurementUnit}`;
    if (seen.has(key)) continue;
    seen.add(key);
    ingredients.push({ name, measurementUnit });
  }
  return ingredients;
}

/** Inserts the ingredients, leaving rows already in the table untouched. */
export async function importIngredients(ingredients: IngredientRecord[]): Promise<ImportSummary> {
  if (ingredients.length === 0) return { inserted: 0, skipped: 0 };

  const result = await query<{ id: number }>(
    `INSERT INTO ingredients (name, measurement_unit)
     SELECT * FROM unnest($1::text[], $2::text[])
     ON CONFLICT (name, measurement_unit) DO NOTHING
     RETURNING id`,
    [ingredients.map((item) => item.name), ingredients.map((item) => item.measurementUnit)],
  );
  const inserted = result.rowCount ?? result.rows.length;
  return { inserted, skipped: ingredients.length - inserted };
}
