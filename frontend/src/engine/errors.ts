export type TrialErrorCode = 'E_INVALID_TRANSITION' | 'E_INVALID_CONFIG';

export class TrialError extends Error {
  readonly code: TrialErrorCode;
  readonly op: string;
  readonly reason: string;
  readonly details?: Record<string, unknown>;

  constructor(code: TrialErrorCode, op: string, reason: string, details?: Record<string, unknown>) {
    super(`${op}: ${reason}`);
    this.name = new.target.name;
    this.code = code;
    this.op = op;
    this.reason = reason;
    if (details) this.details = details;
  }
}

export class InvalidTransition extends TrialError {
  constructor(op: string, reason: string, details?: Record<string, unknown>) {
    super('E_INVALID_TRANSITION', op, reason, details);
  }
}

export class InvalidConfig extends TrialError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super('E_INVALID_CONFIG', 'trial.reset', reason, details);
  }
}
