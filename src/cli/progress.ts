/**
 * @fileoverview Progress indicators for CLI operations
 *
 * Bars render on stderr; stdout carries only the report.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  update(current: number): void;
  stop(): void;
}

export type ProgressFactory = (total: number, task: string) => ProgressBarHandle;

export const NO_PROGRESS: ProgressBarHandle = {
  update: () => undefined,
  stop: () => undefined,
};

export function createProgressBar(total: number, task: string): ProgressBarHandle {
  const bar = new cliProgress.SingleBar(
    {
      format: '{bar} {percentage}% | {value}/{total} | {task} | ETA: {eta_formatted}',
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: true,
      stopOnComplete: true,
      etaBuffer: 10,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(total, 0, { task });

  return {
    update(current: number): void {
      bar.update(current);
    },

    stop(): void {
      bar.stop();
    },
  };
}

/** Elapsed time for the closing log line: `850ms`, `4.2s`, `3m 07s`. */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const rounded = Math.round(totalSeconds);
  const minutes = Math.floor(rounded / 60);
  const seconds = rounded % 60;
  return `${minutes}m ${String(seconds).padStart(2, '0')}s`;
}
