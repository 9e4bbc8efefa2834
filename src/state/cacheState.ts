import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { CacheSnapshot } from "../cache/dedupCache.js";
import { nowISO } from "../util/time.js";

export const CacheState = z.object({
  savedAt: z.string().datetime(),
  entries: z.array(z.tuple([z.string(), z.number()])),
});

export type CacheState = z.infer<typeof CacheState>;

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Read the persisted dedup cache. Returns null when no state has been written yet.
 */
export async function readCacheState(filePath: string): Promise<CacheState | null> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  const parsed: unknown = JSON.parse(text);
  return CacheState.parse(parsed);
}

export async function writeCacheState(filePath: string, entries: CacheSnapshot): Promise<CacheState> {
  const state: CacheState = { savedAt: nowISO(), entries };
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(state, null, 2), "utf-8");
  return state;
}
