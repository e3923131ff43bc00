import type { BoundAction } from './action.js';
import type { ValidationSummary } from './validation.js';

export type StateStatus = 'pending' | 'running' | 'completed' | 'timed_out' | 'cancelled' | 'error';

/** Jeden stav testu sestavený z konfigurace */
export interface StateDescriptor {
  name: string;
  description: string;
  actions: BoundAction[];
  /** Raw `verify.triggers`; a fresh rule map is compiled for every run */
  triggers: unknown;
  timeoutMs: number;
}

export interface StateResult {
  name: string;
  description: string;
  status: StateStatus;
  /** No failed rule left, and the state was neither cancelled nor broken */
  passed: boolean;
  summary: ValidationSummary;
  report: string;
  durationMs: number;
  error?: string;
}
