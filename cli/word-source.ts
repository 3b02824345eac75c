/**
 * Word sources: a CSV word list on disk, or words given as arguments.
 */

import { readFileSync } from "node:fs";
import { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";

export class WordFileError extends Error {
  readonly path: string;

  constructor(path: string, message = `Sorry, the file ${path} does not exist`) {
    super(message);
    this.name = "WordFileError";
    this.path = path;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function cleanWords(words: readonly unknown[]): string[] {
  return words
    .filter((word): word is string => typeof word === "string")
    .map((word) => word.trim())
    .filter((word) => word.length > 0);
}

/**
 * Read the first column of every record in a CSV file.
 * Blank lines and blank first fields are dropped; order and duplicates are kept.
 */
export function readWordFile(path: string): string[] {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new WordFileError(path);
    }
    throw error;
  }

  let records: unknown;
  try {
    records = parse(content, {
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new WordFileError(path, `Sorry, the file ${path} is not a valid word list: ${error.message}`);
    }
    throw error;
  }
  if (!Array.isArray(records)) return [];

  return cleanWords(records.map((record: unknown) => (Array.isArray(record) ? record[0] : undefined)));
}

/** Words passed on the command line, minus blank entries */
export function readWordArgs(args: readonly string[]): string[] {
  return cleanWords(args);
}
