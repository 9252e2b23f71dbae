import { ConfigurationError } from "../errors";
import { createCommandExecutor } from "../executor";
import { RateLimiter } from "../rate-limiter";
import type { SharedSettings } from "../config";
import { GhCliSource } from "./gh-cli";
import { OctokitSource, createGithubOctokit } from "./octokit";
import type { RepositorySource } from "./source";

export type { RepositorySource } from "./source";
export { GhCliSource } from "./gh-cli";
export { OctokitSource } from "./octokit";

export function createSource(settings: SharedSettings): RepositorySource {
  if (settings.source === "api") {
    if (!settings.token) {
      throw new ConfigurationError("GITHUB_TOKEN is required for the api source");
    }
    return new OctokitSource(createGithubOctokit(settings.token, new RateLimiter()));
  }
  // the deadline covers branch lookups only; listings run until gh finishes paging
  return new GhCliSource({
    executor: createCommandExecutor({ debug: settings.debug }),
    lookupExecutor: createCommandExecutor({ timeoutMs: settings.timeoutMs, debug: settings.debug }),
    binary: settings.ghBinary,
  });
}
