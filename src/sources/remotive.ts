import { z } from "zod";
import { htmlToText } from "../transform/text.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";

export const REMOTIVE_API_URL = "https://remotive.com/api/remote-jobs";

const MAX_JOBS = 50;
const GIG_JOB_TYPES = ["contract", "freelance"];

const RemotiveResponse = z.object({
  jobs: z.array(z.unknown()),
});

const RemotiveJob = z.object({
  id: z.number(),
  url: z.string(),
  title: z.string(),
  company_name: z.string().optional(),
  category: z.string().optional(),
  job_type: z.string().optional(),
  publication_date: z.string().optional(),
  candidate_required_location: z.string().optional(),
  salary: z.string().optional(),
  description: z.string().optional(),
});

/**
 * Public JSON listing with server-side search on the profile's skills.
 * Salary is free text, so the value always goes through the extractor.
 */
export class RemotiveAdapter extends SourceAdapter {
  readonly name = "remotive" as const;

  protected async collect(run: DiscoveryRun): Promise<void> {
    const skills = run.profile.skills ?? [];
    const body = await run.fetchJson("listing", REMOTIVE_API_URL, {
      query: { limit: MAX_JOBS, search: skills.length > 0 ? skills.join(" ") : undefined },
    });
    if (body === null) return;

    const response = RemotiveResponse.safeParse(body);
    if (!response.success) {
      run.logger.warn("Unexpected listing shape");
      return;
    }

    for (const item of response.data.jobs.slice(0, MAX_JOBS)) {
      const parsed = RemotiveJob.safeParse(item);
      if (!parsed.success) continue;

      const job = parsed.data;
      const isGig = GIG_JOB_TYPES.includes(job.job_type ?? "");

      run.offer({
        nativeId: String(job.id),
        title: job.title,
        description: htmlToText(job.description),
        url: job.url,
        type: isGig ? "freelance_gig" : "remote_job",
        valueText: job.salary ?? "",
        createdAt: job.publication_date,
        extras: {
          company: job.company_name,
          category: job.category,
          location: job.candidate_required_location,
        },
      });
    }
  }
}
