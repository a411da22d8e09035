import { isSummaryCommand, type Collaborator } from "../coordinator/types";
import type { RateLimiter } from "./rateLimiter";

export interface CollaboratorDeps {
  rateLimiter: RateLimiter;
  assistant: Collaborator;
  summarizer: Collaborator;
}

/**
 * The single collaborator handed to the coordinator: rate limit first, then
 * route summary and chart commands to the summarizer and everything else to the assistant.
 */
export function createCollaborator(deps: CollaboratorDeps): Collaborator {
  return async (event, query) => {
    deps.rateLimiter.assertAllowed(event.authorId);

    if (isSummaryCommand(event.commandName)) {
      return deps.summarizer(event, query);
    }
    return deps.assistant(event, query);
  };
}
