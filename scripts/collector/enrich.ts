import { ExternalToolError, describeError } from "./errors";
import type { RepositorySource } from "./sources/source";
import {
  BRANCH_COUNT_UNAVAILABLE,
  type BranchCount,
  type CollectedRepository,
  type Enriched,
} from "./types";

export interface EnrichOptions {
  /** Branch lookups in flight at once. 1 keeps the calls strictly sequential. */
  concurrency?: number;
  /** Per-lookup deadline; a lookup that misses it gets the placeholder. */
  timeoutMs?: number | null;
  debug?: boolean;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number | null, label: string): Promise<T> {
  if (timeoutMs === null || timeoutMs <= 0) {
    return promise;
  }
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new ExternalToolError({ argv: [label], stderr: `timed out after ${timeoutMs}ms`, exitCode: null, timedOut: true })
      );
    }, timeoutMs);
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

export async function countBranchesOrPlaceholder(
  source: RepositorySource,
  record: CollectedRepository,
  timeoutMs: number | null = null
): Promise<BranchCount> {
  const slug = `${record.owner}/${record.name}`;
  try {
    return await withTimeout(source.countBranches(record.owner, record.name), timeoutMs, `branches of ${slug}`);
  } catch (error) {
    console.warn(`⚠️  Branch count unavailable for ${slug}: ${describeError(error)}`);
    return BRANCH_COUNT_UNAVAILABLE;
  }
}

/**
 * Adds a branch count to every record. A failed lookup only affects its own
 * record, and the output keeps the input order whatever the concurrency.
 */
export async function enrichBranchCounts<T extends CollectedRepository>(
  records: T[],
  source: RepositorySource,
  options: EnrichOptions = {}
): Promise<Array<Enriched<T>>> {
  const results: Array<Enriched<T>> = new Array(records.length);
  const timeoutMs = options.timeoutMs ?? null;
  let index = 0;
  let unavailable = 0;

  const worker = async () => {
    while (true) {
      const currentIndex = index++;
      if (currentIndex >= records.length) {
        break;
      }
      const record = records[currentIndex];
      if (options.debug) {
        console.log(`[${currentIndex + 1}/${records.length}] Counting branches of ${record.owner}/${record.name}…`);
      }
      const branchCount = await countBranchesOrPlaceholder(source, record, timeoutMs);
      if (branchCount === BRANCH_COUNT_UNAVAILABLE) {
        unavailable += 1;
      }
      results[currentIndex] = { ...record, branchCount };
    }
  };

  const workerCount = Math.min(Math.max(1, options.concurrency ?? 1), records.length || 1);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (records.length > 0) {
    console.log(
      `✅ Counted branches for ${records.length - unavailable}/${records.length} repositories` +
        (unavailable > 0 ? ` (${unavailable} unavailable)` : "")
    );
  }
  return results;
}
