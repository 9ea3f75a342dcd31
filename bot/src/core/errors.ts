import { ApiError } from '@google/genai';
import axios from 'axios';

/**
 * Pipeline stage a failure or rejection is attributed to.
 */
export type Stage =
  | 'FEED'
  | 'FILTER'
  | 'EVENT_CAP'
  | 'DEDUP'
  | 'GATEKEEPER'
  | 'RULE_CLARITY'
  | 'SENTIMENT'
  | 'SIZING'
  | 'PORTFOLIO'
  | 'RISK'
  | 'EXECUTION'
  | 'SUPERVISOR'
  | 'QUEUE'
  | 'CONFIG';

export class BotError extends Error {
  public readonly stage: Stage;
  public readonly code: number;

  constructor(message: string, stage: Stage, code = 5000) {
    super(message);
    this.name = new.target.name;
    this.stage = stage;
    this.code = code;
  }
}

/** Feed, advisory or venue timeout / 5xx. Retried with bounded backoff at the boundary. */
export class TransientServiceError extends BotError {
  constructor(message: string, stage: Stage, public readonly original?: unknown) {
    super(message, stage, 4100);
  }
}

/** Expected outcome, not a fault. Logged and discarded. */
export class AdmissionRejected extends BotError {
  constructor(stage: Stage, public readonly reason: string) {
    super(`${stage}: ${reason}`, stage, 2000);
  }
}

/** Buy not filled within constraints; no position is created. */
export class ExecutionFailure extends BotError {
  constructor(message: string) {
    super(message, 'EXECUTION', 4200);
  }
}

export class PositionExitFailure extends BotError {
  constructor(message: string, public readonly marketId: string) {
    super(message, 'SUPERVISOR', 4300);
  }
}

export class InvariantViolation extends BotError {
  constructor(message: string, stage: Stage) {
    super(message, stage, 9000);
  }
}

export class QueueClosedError extends BotError {
  constructor() {
    super('Candidate queue is closed', 'QUEUE', 4400);
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function isTransient(err: unknown): boolean {
  if (err instanceof TransientServiceError) return true;
  if (err instanceof BotError) return false;
  if (axios.isAxiosError(err)) {
    if (!err.response) return true; // network error or timeout
    return isRetryableStatus(err.response.status);
  }
  if (err instanceof ApiError) return isRetryableStatus(err.status);
  return false;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
