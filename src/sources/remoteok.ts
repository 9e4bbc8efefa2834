import { z } from "zod";
import { toMoney } from "../transform/normalize.js";
import { htmlToText } from "../transform/text.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";

export const REMOTEOK_API_URL = "https://remoteok.com/api";
const REMOTEOK_BASE_URL = "https://remoteok.com";

const MAX_JOBS = 50;

const RemoteOkJob = z.object({
  id: z.union([z.string(), z.number()]),
  slug: z.string().optional(),
  position: z.string().min(1),
  company: z.string().optional(),
  url: z.string().optional(),
  description: z.string().optional(),
  date: z.string().optional(),
  tags: z.array(z.string()).optional(),
  location: z.string().optional(),
  salary_min: z.union([z.number(), z.string()]).optional(),
  salary_max: z.union([z.number(), z.string()]).optional(),
});

type RemoteOkJob = z.infer<typeof RemoteOkJob>;

/**
 * Midpoint of the advertised salary band, or whichever end is present.
 */
export function salaryValue(min: unknown, max: unknown): number | null {
  const low = toMoney(min);
  const high = toMoney(max);
  if (low !== null && high !== null) return Math.floor((low + high) / 2);
  return low ?? high;
}

function isLegalNotice(item: unknown): boolean {
  return typeof item === "object" && item !== null && "legal" in item;
}

function jobUrl(job: RemoteOkJob): string | null {
  if (job.url) return job.url;
  if (job.slug) return `${REMOTEOK_BASE_URL}/remote-jobs/${job.slug}`;
  return null;
}

/**
 * Public JSON listing. The first array element is a legal notice, not a job.
 * When the profile names skills, a job must mention one of them.
 */
export class RemoteOkAdapter extends SourceAdapter {
  readonly name = "remoteok" as const;

  protected async collect(run: DiscoveryRun): Promise<void> {
    const body = await run.fetchJson("listing", REMOTEOK_API_URL);
    if (body === null) return;

    if (!Array.isArray(body)) {
      run.logger.warn("Unexpected listing shape");
      return;
    }

    const wanted = [...(run.profile.skills ?? []), ...(run.profile.keywords ?? [])];
    const items: unknown[] = body;
    const jobs = items.filter((item) => !isLegalNotice(item)).slice(0, MAX_JOBS);

    for (const item of jobs) {
      const parsed = RemoteOkJob.safeParse(item);
      if (!parsed.success) continue;

      const job = parsed.data;
      const url = jobUrl(job);
      if (!url) continue;

      const tags = job.tags ?? [];
      const description = htmlToText(job.description);
      if (wanted.length > 0 && !run.matches(`${job.position} ${tags.join(" ")} ${description}`, wanted)) {
        continue;
      }

      run.offer({
        nativeId: String(job.id),
        title: job.company ? `${job.position} at ${job.company}` : job.position,
        description,
        url,
        type: "remote_job",
        platformValue: salaryValue(job.salary_min, job.salary_max),
        valueText: description,
        createdAt: job.date,
        extras: { company: job.company, tags: tags.slice(0, 10), location: job.location },
      });
    }
  }
}
