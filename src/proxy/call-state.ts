export type CallStage =
  | 'received'
  | 'forwarding'
  | 'awaiting_upstream'
  | 'capturing_response'
  | 'classifying'
  | 'recording'
  | 'completed'
  | 'failed';

const TRANSITIONS: Record<CallStage, readonly CallStage[]> = {
  received: ['forwarding', 'failed'],
  forwarding: ['awaiting_upstream'],
  awaiting_upstream: ['capturing_response', 'classifying'],
  capturing_response: ['classifying'],
  classifying: ['recording'],
  recording: ['completed', 'failed'],
  completed: [],
  failed: []
};

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: CallStage,
    public readonly to: CallStage
  ) {
    super(`Illegal call transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
    Object.setPrototypeOf(this, IllegalTransitionError.prototype);
  }
}

// Recording is reachable once per call, which is what keeps a call to a single ledger record
export class CallState {
  private current: CallStage = 'received';
  private reason: string | undefined;
  private readonly visited: CallStage[] = ['received'];

  get stage(): CallStage {
    return this.current;
  }

  get failureReason(): string | undefined {
    return this.reason;
  }

  get history(): readonly CallStage[] {
    return this.visited;
  }

  get terminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  advance(next: Exclude<CallStage, 'failed'>): void {
    this.move(next);
  }

  fail(reason: string): void {
    this.move('failed');
    this.reason = reason;
  }

  private move(next: CallStage): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.current = next;
    this.visited.push(next);
  }
}
