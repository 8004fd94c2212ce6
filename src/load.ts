import { readFile } from "node:fs/promises";
import * as Papa from "papaparse";
import { InputFileError, errorMessage } from "./errors";
import type { NetworkProfile } from "./networks";
import type { PostTable } from "./types";

export function validateFileExtension(fileName: string, extension: string): void {
  if (!fileName.toLowerCase().endsWith(extension)) {
    throw new InputFileError(`Invalid file. The file must be a ${extension}`, fileName);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export function parsePosts(csv: string, filePath: string, network: NetworkProfile): PostTable {
  const parsed = Papa.parse<Record<string, string | undefined>>(csv, {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  // rows with fewer fields than the header are padded; anything else is malformed
  const fatal = parsed.errors.find((e) => e.type === "Quotes" || e.code === "TooManyFields");
  if (fatal) {
    const where = fatal.row === undefined ? "" : ` (row ${fatal.row + 1})`;
    throw new InputFileError(`Error reading file: ${filePath}${where}: ${fatal.message}`, filePath);
  }

  const fields = parsed.meta.fields ?? [];
  if (!fields.includes(network.textColumn)) {
    throw new InputFileError(`Column not found: ${network.textColumn}`, filePath);
  }

  const rows = parsed.data.map((raw) => {
    const row: Record<string, string> = {};
    for (const field of fields) row[field] = raw[field] ?? "";
    return row;
  });

  return { fields, rows };
}

export async function readPosts(filePath: string, network: NetworkProfile): Promise<PostTable> {
  let csv: string;
  try {
    csv = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) throw new InputFileError(`File not found: ${filePath}`, filePath);
    throw new InputFileError(`Error reading file: ${filePath}: ${errorMessage(err)}`, filePath);
  }

  // strip BOM left by spreadsheet exports
  return parsePosts(csv.replace(/^\uFEFF/, ""), filePath, network);
}
