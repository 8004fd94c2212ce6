import { writeFile } from "node:fs/promises";
import { format, parse } from "node:path";
import * as Papa from "papaparse";
import { OUTPUT_SUFFIX } from "./constants";
import type { PostTable } from "./types";

/** `posts/march.csv` -> `posts/march_with_urls.csv` */
export function outputFileName(inputPath: string): string {
  const { dir, name, ext } = parse(inputPath);
  return format({ dir, name: `${name}${OUTPUT_SUFFIX}`, ext });
}

export function withColumn(fields: readonly string[], column: string): string[] {
  return fields.includes(column) ? [...fields] : [...fields, column];
}

export function toCsv(table: PostTable): string {
  return Papa.unparse(
    {
      fields: table.fields,
      data: table.rows.map((r) => table.fields.map((f) => r[f] ?? "")),
    },
    { newline: "\n" }
  );
}

export async function savePosts(table: PostTable, filePath: string): Promise<string> {
  const csv = toCsv(table);
  await writeFile(filePath, csv.endsWith("\n") ? csv : csv + "\n", "utf-8");
  return filePath;
}
