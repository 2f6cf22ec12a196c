/**
 * Run Diff Service
 *
 * Compares the two most recent runs of a job: a numeric delta for charts and a
 * model-written comparison of the two summaries.
 */

import type { RunHistoryRecord, RunStatus } from '@/types/research';
import type { TextGenerator } from '@/services/llm.service';
import { compareRuns } from '@/services/llm.service';
import type { HistoryRepository } from '@/services/scheduler/historyRepository';
import { InsufficientHistoryError } from '@/errors/research';
import { isJobId } from '@/validators/jobs';
import { createLogger } from '@/utils/logger';

const log = createLogger('run-diff');

export const SUMMARY_MISSING_NOTICE = 'Summary text missing in history; semantic diff unavailable.';

export interface NumericDiff {
  resultCountChange: number;
  kgNodeChange: number;
  kgEdgeChange: number;
  latestStatus: RunStatus;
  previousStatus: RunStatus;
  latestRunAt: Date;
  previousRunAt: Date;
}

export interface RunDiffResult {
  jobId: string;
  latest: RunHistoryRecord;
  previous: RunHistoryRecord;
  numericDiff: NumericDiff;
  semanticDiff: string;
}

export function computeNumericDiff(latest: RunHistoryRecord, previous: RunHistoryRecord): NumericDiff {
  return {
    resultCountChange: latest.resultCount - previous.resultCount,
    kgNodeChange: latest.kgNodes - previous.kgNodes,
    kgEdgeChange: latest.kgEdges - previous.kgEdges,
    latestStatus: latest.status,
    previousStatus: previous.status,
    latestRunAt: latest.runFinishedAt,
    previousRunAt: previous.runFinishedAt,
  };
}

export class RunDiffService {
  constructor(
    private readonly history: HistoryRepository,
    private readonly llm: TextGenerator,
  ) {}

  async diff(jobId: string): Promise<RunDiffResult> {
    // A malformed id has no stored runs.
    if (!isJobId(jobId)) throw new InsufficientHistoryError(jobId, 0);

    const runs = await this.history.latestTwo(jobId);
    const [latest, previous] = runs;
    if (!latest || !previous) {
      throw new InsufficientHistoryError(jobId, runs.length);
    }

    const numericDiff = computeNumericDiff(latest, previous);

    const latestSummary = latest.fullSummaryText.trim();
    const previousSummary = previous.fullSummaryText.trim();
    if (!latestSummary || !previousSummary) {
      log.info('Summary text missing; returning numeric diff only', { jobId });
      return { jobId, latest, previous, numericDiff, semanticDiff: SUMMARY_MISSING_NOTICE };
    }

    const semanticDiff = await compareRuns(this.llm, previousSummary, latestSummary, latest.topic);
    return { jobId, latest, previous, numericDiff, semanticDiff };
  }
}
