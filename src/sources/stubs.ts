import type { SourceName } from "../transform/schema.js";
import { SourceAdapter, type DiscoveryRun } from "./base.js";
import type { AdapterContext } from "./types.js";

/**
 * Platform that can only be read with a logged-in session or paid API
 * credentials. It keeps its slot in the registry so callers see a uniform
 * source list, and always yields nothing.
 */
export class CredentialGatedSource extends SourceAdapter {
  constructor(
    context: AdapterContext,
    readonly name: SourceName,
    private readonly requirement: string
  ) {
    super(context);
  }

  protected async collect(run: DiscoveryRun): Promise<void> {
    run.logger.debug({ requirement: this.requirement }, "Source requires credentials; skipping");
  }
}

export function linkedInSource(context: AdapterContext): CredentialGatedSource {
  return new CredentialGatedSource(context, "linkedin", "LinkedIn session login");
}

export function twitterSource(context: AdapterContext): CredentialGatedSource {
  return new CredentialGatedSource(context, "twitter", "X API bearer credentials");
}
