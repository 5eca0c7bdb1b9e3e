// src/state/progressTracker.ts

import type { HintPolicyConfig, ProgressState } from "../types/hints";
import { DEFAULT_HINT_POLICY } from "../config/hintConfig";

export type ProgressRepository = {
  fetchProgress: (userId: string, problemId: string) => Promise<ProgressState | null>;
  createProgress: (state: ProgressState) => Promise<ProgressState>;
};

export function newProgressState(userId: string, problemId: string, now: Date): ProgressState {
  return {
    userId,
    problemId,
    attemptsCount: 0,
    failedAttemptsCount: 0,
    currentHintLevel: 1,
    lastActivityTimestamp: now,
  };
}

/**
 * Struggle-state bookkeeping for one learner on one problem.
 * Every transition returns a new snapshot; storing it is the caller's job.
 */
export class ProgressTracker {
  constructor(
    private readonly repo: ProgressRepository,
    private readonly maxHintLevel: number = DEFAULT_HINT_POLICY.maxHintLevel,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async getOrCreate(userId: string, problemId: string): Promise<ProgressState> {
    const existing = await this.repo.fetchProgress(userId, problemId);
    if (existing) return { ...existing };
    return this.repo.createProgress(newProgressState(userId, problemId, this.clock()));
  }

  recordAttempt(state: ProgressState, succeeded: boolean): ProgressState {
    return {
      ...state,
      attemptsCount: state.attemptsCount + 1,
      failedAttemptsCount: succeeded ? 0 : state.failedAttemptsCount + 1,
    };
  }

  touch(state: ProgressState, now: Date): { state: ProgressState; elapsedSeconds: number } {
    return {
      state: { ...state, lastActivityTimestamp: now },
      elapsedSeconds: elapsedSecondsSince(state.lastActivityTimestamp, now),
    };
  }

  // Levels only go up here; see resetHintLevel for the way back down.
  applyHintLevel(state: ProgressState, level: number): ProgressState {
    const next = Math.max(state.currentHintLevel, Math.trunc(level));
    return { ...state, currentHintLevel: Math.min(Math.max(next, 1), this.maxHintLevel) };
  }

  resetHintLevel(state: ProgressState): ProgressState {
    return { ...state, currentHintLevel: 1 };
  }

  // Idle past the timeout with enough failures behind them.
  isStuck(
    state: ProgressState,
    now: Date,
    config: Pick<HintPolicyConfig, "failureThreshold" | "stuckTimeoutSeconds"> = DEFAULT_HINT_POLICY,
  ): boolean {
    return (
      elapsedSecondsSince(state.lastActivityTimestamp, now) > config.stuckTimeoutSeconds &&
      state.failedAttemptsCount >= config.failureThreshold
    );
  }
}

export function elapsedSecondsSince(last: Date, now: Date): number {
  const ms = now.getTime() - last.getTime();
  if (!Number.isFinite(ms) || ms <= 0) return 0;
  return ms / 1000;
}
