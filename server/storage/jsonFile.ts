import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import logger from "../logger";

export type JsonReadResult =
  | { status: "ok"; value: unknown }
  | { status: "missing" }
  | { status: "unreadable"; error: unknown }
  | { status: "malformed"; error: unknown };

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return { status: "missing" };
    return { status: "unreadable", error };
  }

  try {
    return { status: "ok", value: JSON.parse(raw) };
  } catch (error) {
    return { status: "malformed", error };
  }
}

let tempCounter = 0;

/**
 * Write `value` as pretty JSON next to the target, then rename over it, so
 * readers see either the old document or the new one.
 */
export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });

  tempCounter += 1;
  const tempPath = `${filePath}.${process.pid}.${tempCounter}.tmp`;

  try {
    await writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn("[Storage] Failed to remove temp file", {
        tempPath,
        error: String(cleanupError),
      });
    });
    throw error;
  }
}

/**
 * Move `filePath` aside as `<file>.corrupt-<stamp>`. Resolves to the new
 * path, or undefined when there was no file to move.
 */
export async function preserveFile(filePath: string, stamp: number): Promise<string | undefined> {
  const target = `${filePath}.corrupt-${stamp}`;
  try {
    await rename(filePath, target);
    return target;
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
}
