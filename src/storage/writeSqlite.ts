import { mkdir } from "node:fs/promises";
import path from "node:path";
import Database from "better-sqlite3";
import type { Opportunity } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";

/**
 * Write opportunities to SQLite database with upsert.
 * Re-running a discovery refreshes rows keyed by the composite id.
 */
export async function writeSqlite(
  opportunities: readonly Opportunity[],
  outDir: string,
  logger: Logger
): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const dbPath = path.join(outDir, "opportunities.sqlite");
  const db = new Database(dbPath);

  try {
    db.exec(`
      CREATE TABLE IF NOT EXISTS opportunities (
        id TEXT PRIMARY KEY,
        source TEXT NOT NULL,
        nativeId TEXT NOT NULL,
        title TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        url TEXT NOT NULL,
        type TEXT NOT NULL,
        estimatedValue INTEGER NOT NULL,
        valueSource TEXT NOT NULL,
        createdAt TEXT NOT NULL,
        extras TEXT -- JSON stored as text
      );

      CREATE INDEX IF NOT EXISTS idx_source ON opportunities(source);
      CREATE INDEX IF NOT EXISTS idx_created_at ON opportunities(createdAt);
    `);

    const stmt = db.prepare(`
      INSERT INTO opportunities (
        id, source, nativeId, title, description, url, type,
        estimatedValue, valueSource, createdAt, extras
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        title = excluded.title,
        description = excluded.description,
        url = excluded.url,
        type = excluded.type,
        estimatedValue = excluded.estimatedValue,
        valueSource = excluded.valueSource,
        createdAt = excluded.createdAt,
        extras = excluded.extras
    `);

    const insertMany = db.transaction((opps: readonly Opportunity[]) => {
      for (const opp of opps) {
        stmt.run(
          opp.id,
          opp.source,
          opp.nativeId,
          opp.title,
          opp.description,
          opp.url,
          opp.type,
          opp.estimatedValue,
          opp.valueSource,
          opp.createdAt,
          JSON.stringify(opp.extras ?? {})
        );
      }
    });

    insertMany(opportunities);

    logger.info({ dbPath, count: opportunities.length }, "Wrote SQLite database");
  } finally {
    db.close();
  }

  return dbPath;
}
