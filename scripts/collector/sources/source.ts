import type { OwnedRepositoryPayload, RestRepositoryPayload } from "../schemas";

export interface RepositorySource {
  readonly kind: string;
  /** Owned repositories, asking the host for at most `limit` records. */
  listOwned(username: string, limit?: number): Promise<OwnedRepositoryPayload[]>;
  /** Every starred repository, newest star first. There is no count cap. */
  listStarred(username?: string): Promise<RestRepositoryPayload[]>;
  countBranches(owner: string, name: string): Promise<number>;
}
