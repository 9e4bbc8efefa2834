import { mkdir } from "node:fs/promises";
import path from "node:path";
import { createObjectCsvWriter } from "csv-writer";
import type { Opportunity } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";

/**
 * Write opportunities to CSV file (tabular subset of fields).
 */
export async function writeCsv(
  opportunities: readonly Opportunity[],
  outDir: string,
  logger: Logger
): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const filePath = path.join(outDir, "opportunities.csv");

  const csvWriter = createObjectCsvWriter({
    path: filePath,
    header: [
      { id: "id", title: "ID" },
      { id: "source", title: "Source" },
      { id: "nativeId", title: "Native ID" },
      { id: "type", title: "Type" },
      { id: "title", title: "Title" },
      { id: "estimatedValue", title: "Estimated Value" },
      { id: "valueSource", title: "Value Source" },
      { id: "createdAt", title: "Created At" },
      { id: "url", title: "URL" },
      { id: "company", title: "Company" },
      { id: "subreddit", title: "Subreddit" },
      { id: "category", title: "Category" },
    ],
  });

  const records = opportunities.map((opp) => ({
    id: opp.id,
    source: opp.source,
    nativeId: opp.nativeId,
    type: opp.type,
    title: opp.title,
    estimatedValue: opp.estimatedValue.toString(),
    valueSource: opp.valueSource,
    createdAt: opp.createdAt,
    url: opp.url,
    company: opp.extras?.company ?? "",
    subreddit: opp.extras?.subreddit ?? "",
    category: opp.extras?.category ?? "",
  }));

  await csvWriter.writeRecords(records);

  logger.info({ filePath, count: opportunities.length }, "Wrote CSV file");
  return filePath;
}
