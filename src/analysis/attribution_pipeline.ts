/**
 * @fileoverview Worker pool that resolves issues and folds them into stats.
 *
 * Issues that fail attribution are dropped entirely: they count toward no
 * author, file or rule. File and rule exclusions are applied before
 * resolution so ignored issues never spawn git.
 */

import { isAttributionError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { Issue, IssueFilter } from '../types.js';
import type { IssueResolver, Resolution } from './issue_resolver.js';
import type { StatsAggregator } from './stats_aggregator.js';

export interface AttributionPipelineOptions {
  resolver: IssueResolver;
  aggregator: StatsAggregator;
  /** Worker count; keep at or below the blame gate capacity. */
  concurrency: number;
  filter?: IssueFilter;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

export interface AttributionSummary {
  total: number;
  recorded: number;
  excluded: number;
  unattributed: number;
  failed: number;
}

type Outcome = 'recorded' | 'excluded' | 'unattributed' | 'failed';

export async function attributeIssues(
  issues: readonly Issue[],
  options: AttributionPipelineOptions
): Promise<AttributionSummary> {
  const { resolver, aggregator, filter, signal, onProgress } = options;
  const summary: AttributionSummary = {
    total: issues.length,
    recorded: 0,
    excluded: 0,
    unattributed: 0,
    failed: 0,
  };
  if (issues.length === 0) {
    return summary;
  }

  const workers = Math.max(1, Math.min(Math.floor(options.concurrency), issues.length));
  let cursor = 0;
  let completed = 0;
  let stopped = false;

  const processIssue = async (issue: Issue): Promise<Outcome> => {
    if (filter && (filter.shouldIgnoreFile(issue.filePath) || filter.shouldIgnoreRule(issue.ruleId))) {
      return 'excluded';
    }
    let resolution: Resolution;
    try {
      resolution = await resolver.resolve(issue, { signal });
    } catch (error) {
      if (isAttributionError(error)) {
        return 'failed';
      }
      throw error;
    }
    if (!resolution.found) {
      return 'unattributed';
    }
    return (await aggregator.record(issue, resolution.blame)) ? 'recorded' : 'excluded';
  };

  const worker = async (): Promise<void> => {
    while (!stopped && cursor < issues.length) {
      signal?.throwIfAborted();
      const issue = issues[cursor];
      cursor += 1;
      if (!issue) continue;
      try {
        const outcome = await processIssue(issue);
        summary[outcome] += 1;
      } catch (error) {
        stopped = true;
        throw error;
      }
      completed += 1;
      onProgress?.(completed, issues.length);
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));
  logDebug('[lintboard] attribution complete', { ...summary, workers });
  return summary;
}
