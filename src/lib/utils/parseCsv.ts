import { promises as fs } from 'fs';
import { parse } from 'csv-parse/sync';

export type CsvRecord = Record<string, string>;

export default async function parseCsv(pathName: string): Promise<CsvRecord[]> {
  const content = await fs.readFile(pathName);

  // Header row becomes the record keys
  const records: CsvRecord[] = parse(content, {
    bom: true,
    columns: (header: string[]) => header.map((column) => column.trim()),
    skip_empty_lines: true,
    relax_column_count: true,
  });

  return records;
}
