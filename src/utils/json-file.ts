import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import * as lockfile from "proper-lockfile";
import type { ZodType, ZodTypeDef } from "zod";

export type JsonReadResult<T> =
  | { readonly status: "ok"; readonly value: T }
  | { readonly status: "missing" }
  | { readonly status: "invalid"; readonly reason: string };

export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: 3, minTimeout: 100 },
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}

/** Read a JSON document and validate it, reporting why it could not be used. */
export async function readJsonFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<JsonReadResult<T>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return { status: "missing" };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { status: "invalid", reason: err instanceof Error ? err.message : String(err) };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return { status: "invalid", reason: result.error.message };
  }
  return { status: "ok", value: result.data };
}

/** Rewrite the whole document under an advisory lock. */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await withFileLock(filePath, async () => {
    await writeFile(filePath, JSON.stringify(value, null, 2) + "\n");
  });
}
