/**
 * Scenario State Machine
 *
 * Validates state transitions for the two verification scenarios.
 *
 * ```
 * search:  init -> compare_all -> compare_refined -> done
 * ingest:  init -> upload -> verify -> done
 * ```
 *
 * Any non-terminal state may move to `failed`. `done` and `failed` are
 * terminal; there are no retries, so nothing leaves `failed`.
 *
 * @module @dicom-it/core/scenario/state-machine
 */

import { HarnessError } from '../errors/index.js';

export type ScenarioKind = 'search' | 'ingest';

export type ScenarioState =
  | 'init'
  | 'compare_all'
  | 'compare_refined'
  | 'upload'
  | 'verify'
  | 'done'
  | 'failed';

const SCENARIO_TRANSITIONS: Record<ScenarioKind, Partial<Record<ScenarioState, ScenarioState[]>>> = {
  search: {
    init: ['compare_all', 'failed'],
    compare_all: ['compare_refined', 'failed'],
    compare_refined: ['done', 'failed'],
  },
  ingest: {
    init: ['upload', 'failed'],
    upload: ['verify', 'failed'],
    verify: ['done', 'failed'],
  },
};

const TERMINAL_STATES: ReadonlySet<ScenarioState> = new Set(['done', 'failed']);

/**
 * Error thrown when a transition is not allowed
 */
export class InvalidTransitionError extends HarnessError {
  constructor(
    readonly scenario: ScenarioKind,
    readonly from: ScenarioState,
    readonly to: ScenarioState
  ) {
    super(
      `Invalid ${scenario} scenario transition: ${from} -> ${to}`,
      'INVALID_TRANSITION',
      { scenario, from, to }
    );
    this.name = 'InvalidTransitionError';
  }
}

export function isValidTransition(
  scenario: ScenarioKind,
  from: ScenarioState,
  to: ScenarioState
): boolean {
  const allowed = SCENARIO_TRANSITIONS[scenario][from] ?? [];
  return allowed.includes(to);
}

export function isTerminalState(state: ScenarioState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface TransitionRecord {
  from: ScenarioState;
  to: ScenarioState;
  at: Date;
}

/**
 * Tracks the current state of one scenario run and its history
 */
export class ScenarioStateMachine {
  private current: ScenarioState = 'init';
  private readonly history: TransitionRecord[] = [];

  constructor(readonly scenario: ScenarioKind) {}

  get state(): ScenarioState {
    return this.current;
  }

  get transitions(): readonly TransitionRecord[] {
    return this.history;
  }

  /**
   * @throws {InvalidTransitionError} If the move is not allowed
   */
  transition(to: ScenarioState): void {
    if (!isValidTransition(this.scenario, this.current, to)) {
      throw new InvalidTransitionError(this.scenario, this.current, to);
    }
    this.history.push({ from: this.current, to, at: new Date() });
    this.current = to;
  }

  /**
   * Move to `failed` unless already terminal
   */
  fail(): void {
    if (!isTerminalState(this.current)) {
      this.transition('failed');
    }
  }
}
