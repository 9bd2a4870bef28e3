/**
 * JSON File Helpers
 *
 * Shared by the file-backed stores. Writes go to a temporary sibling first
 * and are renamed into place, so a crash never leaves a half-written file.
 *
 * @module storage/json-file
 */

import * as fs from "fs/promises";
import * as path from "path";

/**
 * Outcome of reading a JSON file
 */
export type JsonReadResult =
  | { readonly status: "missing" }
  | { readonly status: "invalid"; readonly reason: string }
  | { readonly status: "ok"; readonly data: unknown };

export async function readJsonFile(file: string): Promise<JsonReadResult> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return { status: "missing" };
    }
    throw error;
  }

  try {
    const data: unknown = JSON.parse(text);
    return { status: "ok", data };
  } catch (error) {
    return {
      status: "invalid",
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}

export async function writeJsonFile(file: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });

  const tempFile = `${file}.${process.pid}.tmp`;
  await fs.writeFile(tempFile, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
  await fs.rename(tempFile, file);
}

/**
 * Serializes async tasks; each starts after the previous one settles
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Errors from `fs` may come from another realm, so `instanceof Error` is not
 * reliable here
 */
function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}
