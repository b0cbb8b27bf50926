/**
 * @fileoverview Line attribution service.
 *
 * Owns the per-run blame cache and failure memo. A path moves from unseen to
 * pending (one shared in-flight promise, gate permit held) to either cached
 * or failed; only the terminal states are kept. Failed paths are never
 * blamed again in the same run.
 *
 * Cache, memo and in-flight maps are guarded by this service's own mutex.
 * The subprocess itself runs outside that lock, bounded by the gate.
 *
 * A shared blame runs under a controller owned by the service, not under any
 * one caller's signal. Each caller races the shared promise against its own
 * signal; the subprocess is cancelled only once every waiting caller has
 * cancelled.
 */

import { AttributionError, GitCommandError, type AttributionFailureReason } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { BlameIndex, WarningSink } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { normalizePath, type GitRunner } from '../utils/git.js';
import { Mutex, Semaphore } from '../utils/semaphore.js';
import { parseBlameOutput } from './blame_indexer.js';

export const DEFAULT_BLAME_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_CONCURRENT_BLAME = 4;

export interface BlameServiceOptions {
  runner: GitRunner;
  /** Shared gate for blame subprocesses. Defaults to a gate of capacity 4. */
  gate?: Semaphore;
  /** Receives one message per failed path. */
  warnings?: WarningSink;
  timeoutMs?: number;
}

export interface AttributeOptions {
  /** Per-caller gate, e.g. the spell checker's own. */
  gate?: Semaphore;
  signal?: AbortSignal;
}

interface PendingBlame {
  promise: Promise<BlameIndex>;
  controller: AbortController;
  /** Callers still waiting on `promise`. */
  waiting: number;
}

type Lookup = { kind: 'cached'; index: BlameIndex } | { kind: 'pending'; entry: PendingBlame };

export interface BlameServiceStats {
  cached: number;
  failed: number;
  invocations: number;
}

export class BlameService {
  readonly gate: Semaphore;
  private readonly runner: GitRunner;
  private readonly warnings?: WarningSink;
  private readonly timeoutMs: number;

  private readonly lock = new Mutex();
  private readonly cache = new Map<string, BlameIndex>();
  private readonly failures = new Map<string, AttributionError>();
  private readonly inFlight = new Map<string, PendingBlame>();
  private invocations = 0;

  constructor(options: BlameServiceOptions) {
    this.runner = options.runner;
    this.gate = options.gate ?? new Semaphore(DEFAULT_MAX_CONCURRENT_BLAME);
    this.warnings = options.warnings;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BLAME_TIMEOUT_MS;
  }

  /**
   * Line-to-contributor index for `filePath`.
   *
   * @throws AttributionError when blame fails now or failed earlier in the run
   */
  async attribute(filePath: string, options: AttributeOptions = {}): Promise<BlameIndex> {
    const key = normalizePath(filePath);
    const lookup = await this.lock.runExclusive((): Lookup => {
      const cached = this.cache.get(key);
      if (cached) {
        return { kind: 'cached', index: cached };
      }
      const failure = this.failures.get(key);
      if (failure) {
        throw new AttributionError(key, 'previously_failed', `earlier attempt ended with ${failure.reason}`);
      }
      let entry = this.inFlight.get(key);
      if (!entry) {
        const controller = new AbortController();
        entry = { controller, waiting: 0, promise: this.load(key, controller, options.gate) };
        this.inFlight.set(key, entry);
      }
      entry.waiting += 1;
      return { kind: 'pending', entry };
    });
    if (lookup.kind === 'cached') {
      return lookup.index;
    }
    return this.follow(key, lookup.entry, options.signal);
  }

  stats(): BlameServiceStats {
    return {
      cached: this.cache.size,
      failed: this.failures.size,
      invocations: this.invocations,
    };
  }

  /** Forget cached indexes and failures. In-flight attributions still complete. */
  async clear(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.cache.clear();
      this.failures.clear();
    });
  }

  /** Waits on a shared blame until it settles or `signal` aborts, whichever comes first. */
  private follow(key: string, entry: PendingBlame, signal?: AbortSignal): Promise<BlameIndex> {
    if (!signal) {
      return entry.promise;
    }
    return new Promise<BlameIndex>((resolve, reject) => {
      const onAbort = (): void => {
        entry.waiting -= 1;
        if (entry.waiting === 0) {
          // Nobody is left to use the result; the path stays unseen.
          if (this.inFlight.get(key) === entry) {
            this.inFlight.delete(key);
          }
          entry.controller.abort(signal.reason);
        }
        reject(signal.reason);
      };
      void entry.promise.then(
        (index) => {
          signal.removeEventListener('abort', onAbort);
          resolve(index);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  private async load(key: string, controller: AbortController, gate?: Semaphore): Promise<BlameIndex> {
    const isCurrent = (): boolean => this.inFlight.get(key)?.controller === controller;
    try {
      const index = await this.blame(key, controller.signal, gate);
      await this.lock.runExclusive(() => {
        this.cache.set(key, index);
        if (isCurrent()) {
          this.inFlight.delete(key);
        }
      });
      return index;
    } catch (error) {
      if (controller.signal.aborted) {
        throw error;
      }
      const failure = new AttributionError(key, failureReason(error), getErrorMessage(error));
      await this.lock.runExclusive(() => {
        this.failures.set(key, failure);
        if (isCurrent()) {
          this.inFlight.delete(key);
        }
      });
      await this.warnings?.warn(`Blame failed for ${key}: ${getErrorMessage(error)}`);
      throw failure;
    }
  }

  private async blame(key: string, signal: AbortSignal, gate: Semaphore = this.gate): Promise<BlameIndex> {
    await gate.acquire(signal);
    try {
      this.invocations += 1;
      const started = Date.now();
      const output = await this.runner.run(['blame', '--line-porcelain', '--', key], {
        timeoutMs: this.timeoutMs,
        signal,
      });
      const index = parseBlameOutput(output);
      logDebug('[lintboard] blame complete', { file: key, lines: index.size, durationMs: Date.now() - started });
      return index;
    } finally {
      gate.release();
    }
  }
}

function failureReason(error: unknown): AttributionFailureReason {
  return error instanceof GitCommandError && error.timedOut ? 'timeout' : 'command_failed';
}
