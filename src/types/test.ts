import type { ListenerKind } from './event.js';
import type { StateDescriptor, StateResult } from './state.js';
import type { WatchMode } from '../listener/watch-strategy.js';

export type StateOrder = 'sequence' | 'random';

export type TestStatus = 'passed' | 'failed' | 'timed_out' | 'cancelled';

export interface ListenerSettings {
  kind: ListenerKind;
  destination: string;
  watch: WatchMode;
  pollIntervalMs: number;
}

export interface TestDescriptor {
  name: string;
  /** Soubor, ze kterého test vznikl (u in-memory konfigurace chybí) */
  source?: string;
  states: StateDescriptor[];
  timeoutMs: number;
  order: StateOrder;
  /** Seed pro `random` pořadí; bez něj se vygeneruje */
  seed?: number;
  listener: ListenerSettings;
}

export interface TestResult {
  name: string;
  passed: boolean;
  status: TestStatus;
  states: StateResult[];
  /** Effective seed, present for `random` order */
  seed?: number;
  durationMs: number;
}

/** Test přeskočený kvůli chybě konfigurace */
export interface SkippedTest {
  name: string;
  source?: string;
  error: string;
}
