import fs from "fs";
import path from "path";
import { z } from "zod";
import logger from "../utils/logger";
import { CACHE_TTL_MS, RAW_DIR } from "../utils/config";
import { errorMessage } from "../utils/errors";
import { DailyValue } from "./types";

// ── Disk cache ───────────────────────────────────────────────────────────────

const CacheFileSchema = z.object({
  fetchedAt: z.number(),
  rows: z.array(z.object({ date: z.string(), value: z.number() })),
});

type CacheFile = z.infer<typeof CacheFileSchema>;

export function cachePath(name: string, dir = RAW_DIR): string {
  return path.join(dir, `${name}.json`);
}

/** Returns cached rows, or null when missing, unreadable or older than the TTL. */
export function readCache(name: string, dir = RAW_DIR, now = Date.now()): DailyValue[] | null {
  const p = cachePath(name, dir);
  if (!fs.existsSync(p)) return null;
  try {
    const raw = CacheFileSchema.parse(JSON.parse(fs.readFileSync(p, "utf-8")));
    if (now - raw.fetchedAt > CACHE_TTL_MS) return null; // stale after 24 h
    return raw.rows;
  } catch (err) {
    logger.warn(`Ignoring unreadable cache ${path.basename(p)}: ${errorMessage(err)}`);
    return null;
  }
}

export function writeCache(name: string, rows: DailyValue[], dir = RAW_DIR, now = Date.now()): string {
  fs.mkdirSync(dir, { recursive: true });
  const data: CacheFile = { fetchedAt: now, rows };
  const p = cachePath(name, dir);
  fs.writeFileSync(p, JSON.stringify(data, null, 2));
  logger.info(`Saved ${path.basename(p)} (${rows.length} rows)`);
  return p;
}

/** Serves `name` from disk when fresh, otherwise calls `fetcher` and stores the result. */
export async function cached(
  name: string,
  fetcher: () => Promise<DailyValue[]>,
  opts: { refresh?: boolean; dir?: string } = {},
): Promise<DailyValue[]> {
  const dir = opts.dir ?? RAW_DIR;
  if (!opts.refresh) {
    const hit = readCache(name, dir);
    if (hit) {
      logger.info(`  [cache]   ${name.padEnd(10)} ${hit.length} days`);
      return hit;
    }
  }
  const rows = await fetcher();
  writeCache(name, rows, dir);
  return rows;
}
