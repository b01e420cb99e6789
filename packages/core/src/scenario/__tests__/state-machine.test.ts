import { describe, it, expect } from 'vitest';
import {
  InvalidTransitionError,
  ScenarioStateMachine,
  isTerminalState,
  isValidTransition,
} from '../state-machine.js';

describe('isValidTransition', () => {
  it('should follow the search path', () => {
    expect(isValidTransition('search', 'init', 'compare_all')).toBe(true);
    expect(isValidTransition('search', 'compare_all', 'compare_refined')).toBe(true);
    expect(isValidTransition('search', 'compare_refined', 'done')).toBe(true);
  });

  it('should follow the ingest path', () => {
    expect(isValidTransition('ingest', 'init', 'upload')).toBe(true);
    expect(isValidTransition('ingest', 'upload', 'verify')).toBe(true);
    expect(isValidTransition('ingest', 'verify', 'done')).toBe(true);
  });

  it('should reject skipped and foreign states', () => {
    expect(isValidTransition('search', 'init', 'compare_refined')).toBe(false);
    expect(isValidTransition('search', 'init', 'upload')).toBe(false);
    expect(isValidTransition('ingest', 'upload', 'done')).toBe(false);
  });

  it('should not leave failed', () => {
    expect(isValidTransition('ingest', 'failed', 'upload')).toBe(false);
  });
});

describe('isTerminalState', () => {
  it('should mark done and failed as terminal', () => {
    expect(isTerminalState('done')).toBe(true);
    expect(isTerminalState('failed')).toBe(true);
    expect(isTerminalState('verify')).toBe(false);
  });
});

describe('ScenarioStateMachine', () => {
  it('should record transitions in order', () => {
    const machine = new ScenarioStateMachine('ingest');

    machine.transition('upload');
    machine.transition('verify');
    machine.transition('done');

    expect(machine.state).toBe('done');
    expect(machine.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      'init->upload',
      'upload->verify',
      'verify->done',
    ]);
  });

  it('should throw on an invalid transition', () => {
    const machine = new ScenarioStateMachine('search');

    expect(() => machine.transition('done')).toThrow(InvalidTransitionError);
    expect(machine.state).toBe('init');
  });

  it('should fail once and ignore later failures', () => {
    const machine = new ScenarioStateMachine('search');
    machine.transition('compare_all');

    machine.fail();
    machine.fail();

    expect(machine.state).toBe('failed');
    expect(machine.transitions).toHaveLength(2);
  });

  it('should not fail after done', () => {
    const machine = new ScenarioStateMachine('search');
    machine.transition('compare_all');
    machine.transition('compare_refined');
    machine.transition('done');

    machine.fail();

    expect(machine.state).toBe('done');
  });
});
