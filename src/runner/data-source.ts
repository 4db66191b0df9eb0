import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DataSourceError } from './errors.ts';

export type Row = Readonly<Record<string, string>>;

const RecordsSchema = z.array(z.array(z.string()));

/**
 * Parse CSV text into binding rows.
 * The header row names the binding keys; every following row is one case, all values strings.
 */
export function parseCsvRows(content: string, source: string): Row[] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: false,
    });
  } catch (error) {
    throw new DataSourceError(source, error instanceof Error ? error.message : String(error));
  }

  const records = RecordsSchema.safeParse(parsed);
  if (!records.success) {
    throw new DataSourceError(source, 'unexpected record shape');
  }

  const [header, ...body] = records.data;
  if (!header || header.length === 0) {
    throw new DataSourceError(source, 'missing header row');
  }

  const columns = header.map((column) => column.trim());
  const seen = new Set<string>();
  for (const column of columns) {
    if (column === '') {
      throw new DataSourceError(source, 'empty column name in header row');
    }
    if (seen.has(column)) {
      throw new DataSourceError(source, `duplicate column "${column}"`);
    }
    seen.add(column);
  }

  return body.map((record) => {
    const row: Record<string, string> = {};
    columns.forEach((column, i) => {
      row[column] = record[i] ?? '';
    });
    return row;
  });
}

export async function loadCsvRows(path: string): Promise<Row[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new DataSourceError(path, error instanceof Error ? error.message : String(error));
  }
  return parseCsvRows(content, path);
}
