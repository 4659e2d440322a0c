import { describe, it, expect } from 'vitest';
import { CallState, IllegalTransitionError } from './call-state.js';

describe('CallState', () => {
  it('walks the success path', () => {
    const state = new CallState();
    state.advance('forwarding');
    state.advance('awaiting_upstream');
    state.advance('capturing_response');
    state.advance('classifying');
    state.advance('recording');
    state.advance('completed');

    expect(state.terminal).toBe(true);
    expect(state.history).toEqual([
      'received',
      'forwarding',
      'awaiting_upstream',
      'capturing_response',
      'classifying',
      'recording',
      'completed'
    ]);
  });

  it('goes straight to classifying when the upstream fails', () => {
    const state = new CallState();
    state.advance('forwarding');
    state.advance('awaiting_upstream');
    state.advance('classifying');
    state.advance('recording');
    state.fail('upstream:timeout');

    expect(state.stage).toBe('failed');
    expect(state.failureReason).toBe('upstream:timeout');
  });

  it('fails a rejected call before forwarding', () => {
    const state = new CallState();
    state.fail('rejected:UNKNOWN_AGENT');

    expect(state.history).toEqual(['received', 'failed']);
  });

  it('throws on skipped stages', () => {
    const state = new CallState();

    expect(() => state.advance('recording')).toThrow(IllegalTransitionError);
    expect(state.stage).toBe('received');
  });

  it('allows recording only once', () => {
    const state = new CallState();
    state.advance('forwarding');
    state.advance('awaiting_upstream');
    state.advance('classifying');
    state.advance('recording');

    expect(() => state.advance('recording')).toThrow('Illegal call transition recording -> recording');
  });

  it('cannot leave a terminal stage', () => {
    const state = new CallState();
    state.fail('rejected:AGENT_SUSPENDED');

    expect(() => state.advance('forwarding')).toThrow(IllegalTransitionError);
  });
});
