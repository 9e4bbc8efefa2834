#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { runDiscovery } from "../index.js";

function commaList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return [...previous, ...items];
}

function nonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

interface DiscoverCommandOptions {
  caller: string;
  sources?: string[];
  skills?: string[];
  keywords?: string[];
  minValue?: number;
  outDir: string;
  sqlite?: boolean;
  state: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name("opportunity-discover")
  .description("Discover paid work and collaboration opportunities across public platforms")
  .version("1.0.0");

program
  .command("discover")
  .description("Run one discovery batch and write the results")
  .option("--caller <id>", "Identifier echoed in the result", "cli")
  .option("--sources <names>", "Sources to query (comma-separated or repeatable)", commaList)
  .option("--skills <skills>", "Skills used as search terms (comma-separated)", commaList)
  .option("--keywords <keywords>", "Extra relevance keywords (comma-separated)", commaList)
  .option("--minValue <number>", "Minimum estimated value", nonNegativeInt)
  .option("--outDir <path>", "Output directory", "./data")
  .option("--sqlite", "Also write SQLite database")
  .option("--no-state", "Do not load or persist the dedup cache")
  .option("--verbose", "Verbose logging")
  .action(async (options: DiscoverCommandOptions) => {
    try {
      const result = await runDiscovery({
        caller: options.caller,
        sources: options.sources,
        profile: {
          skills: options.skills,
          keywords: options.keywords,
          minValue: options.minValue,
        },
        outDir: options.outDir,
        sqlite: options.sqlite ?? false,
        state: options.state,
        verbose: options.verbose ?? false,
      });

      console.log("\n✅ Discovery completed");
      console.log(`   Found: ${result.totalFound}`);
      console.log(`   Total value: $${result.totalValue}`);
      console.log(`   Default-valued: ${result.defaultValuedCount}`);
      for (const name of result.sourcesAttempted) {
        const outcome = result.bySource[name];
        if (!outcome) continue;
        const detail = outcome.status === "ok" ? "" : ` (${outcome.error})`;
        console.log(`   ${name}: ${outcome.status}, ${outcome.count}${detail}`);
      }
      console.log(`   Duration: ${(result.durationMs / 1000).toFixed(2)}s`);

      process.exit(0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("\n❌ Discovery failed:", message);
      process.exit(1);
    }
  });

program.parse();
