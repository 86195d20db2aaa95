import fs from "node:fs/promises";

import type { z } from "zod";

import { ConfigError, describeError } from "./errors.js";

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

function isMissingFileError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) {
    return false;
  }
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}

/**
 * Reads and validates a JSON state file. A missing file is written with
 * `fallback` and `fallback` is returned.
 */
export async function loadJsonFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
  fallback: z.output<S>,
): Promise<z.output<S>> {
  let data: string;
  try {
    data = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFileError(err)) {
      await fs.writeFile(filePath, JSON.stringify(fallback, null, 2));
      return fallback;
    }
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new ConfigError(`${filePath} is not valid JSON: ${describeError(err)}`, filePath);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ConfigError(`${filePath} is invalid${where}: ${issue?.message ?? "unknown error"}`, filePath);
  }
  return result.data;
}
