import type { ChatId, ContentKey, Messenger, ResolveOutcome } from '../types/relay.js';
import { errorMessage } from './errors.js';
import { Limiter } from './limiter.js';
import type { FetchAndDeliverOrchestrator } from './orchestrator.js';

export const DEFAULT_BATCH_MAX_CONCURRENT = 5;
export const DEFAULT_BATCH_PROGRESS_EVERY = 3;

export interface BatchProgress {
  completed: number;
  total: number;
}

export interface BatchRunRequest {
  keys: ContentKey[];
  messenger: Messenger;
  destination: ChatId;
  onProgress?: (progress: BatchProgress) => Promise<void> | void;
  /** Overrides the coordinator's default for this run. */
  progressEvery?: number;
}

export interface BatchReport {
  total: number;
  cachedCount: number;
  missCount: number;
  delivered: ContentKey[];
  failed: Array<{ key: ContentKey; reason: string }>;
  outcomes: Array<{ key: ContentKey; outcome: ResolveOutcome }>;
}

export interface BatchPartition {
  cached: ContentKey[];
  misses: ContentKey[];
}

export class BatchCoordinator {
  private readonly maxConcurrent: number;
  private readonly progressEvery: number;

  constructor(
    private readonly orchestrator: FetchAndDeliverOrchestrator,
    options: { maxConcurrent?: number; progressEvery?: number } = {},
  ) {
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_BATCH_MAX_CONCURRENT;
    this.progressEvery = Math.max(1, options.progressEvery ?? DEFAULT_BATCH_PROGRESS_EVERY);
  }

  partition(keys: ContentKey[]): BatchPartition {
    const cached: ContentKey[] = [];
    const misses: ContentKey[] = [];
    for (const key of keys) {
      if (this.orchestrator.isCached(key)) {
        cached.push(key);
      } else {
        misses.push(key);
      }
    }
    return { cached, misses };
  }

  async run(request: BatchRunRequest): Promise<BatchReport> {
    const { messenger, destination, onProgress } = request;
    const progressEvery = Math.max(1, request.progressEvery ?? this.progressEvery);
    const { cached, misses } = this.partition(request.keys);
    const report: BatchReport = {
      total: request.keys.length,
      cachedCount: cached.length,
      missCount: misses.length,
      delivered: [],
      failed: [],
      outcomes: [],
    };

    const record = (key: ContentKey, outcome: ResolveOutcome) => {
      report.outcomes.push({ key, outcome });
      if (outcome.kind === 'failed') {
        report.failed.push({ key, reason: outcome.reason });
        console.warn(`[relay] batch item failed key=${key} reason=${outcome.reason}`);
      } else {
        report.delivered.push(key);
      }
    };

    for (const key of cached) {
      const outcome =
        (await this.orchestrator.resolveCached(key, messenger, destination))
        ?? (await this.orchestrator.resolve(key, messenger, destination));
      record(key, outcome);
    }

    const limiter = new Limiter(this.maxConcurrent);
    let completed = 0;

    await Promise.all(
      misses.map((key) =>
        limiter.run(async () => {
          let outcome: ResolveOutcome;
          try {
            outcome = await this.orchestrator.resolve(key, messenger, destination);
          } catch (error) {
            outcome = { kind: 'failed', reason: errorMessage(error) };
          }
          record(key, outcome);

          completed += 1;
          if (onProgress && completed % progressEvery === 0) {
            this.notify(onProgress, { completed, total: misses.length });
          }
        }),
      ),
    );

    return report;
  }

  private notify(
    onProgress: NonNullable<BatchRunRequest['onProgress']>,
    progress: BatchProgress,
  ): void {
    void Promise.resolve()
      .then(() => onProgress(progress))
      .catch((error: unknown) => {
        console.warn(`[relay] progress notice failed error=${errorMessage(error)}`);
      });
  }
}
