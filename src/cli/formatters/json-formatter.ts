/**
 * JSON formátter pro CLI výstup.
 */

import type { FormattableData, RunReport } from '../types.js';
import type { OutputFormatter } from './index.js';

export class JsonFormatter implements OutputFormatter {
  constructor(private readonly pretty: boolean = false) {}

  format(data: FormattableData): string {
    const output = this.toOutputObject(data);
    return this.pretty ? JSON.stringify(output, null, 2) : JSON.stringify(output);
  }

  private toOutputObject(data: FormattableData): unknown {
    switch (data.type) {
      case 'error':
        return { success: false, error: data.data };

      case 'message':
        return { success: true, message: data.data };

      case 'validation':
        return {
          success: data.data.skipped.length === 0,
          tests: data.data.tests,
          skipped: data.data.skipped
        };

      case 'run':
        return this.runOutput(data.data);
    }
  }

  private runOutput({ summary, skipped }: RunReport): unknown {
    return {
      success: summary.passed && skipped.length === 0,
      durationMs: summary.durationMs,
      cancelled: summary.cancelled,
      tests: summary.results.map((test) => ({
        name: test.name,
        status: test.status,
        passed: test.passed,
        durationMs: test.durationMs,
        ...(test.seed !== undefined && { seed: test.seed }),
        states: test.states.map((state) => ({
          name: state.name,
          status: state.status,
          passed: state.passed,
          durationMs: state.durationMs,
          matched: state.summary.matched,
          total: state.summary.total,
          attributes: state.summary.attributes,
          ...(state.error !== undefined && { error: state.error })
        }))
      })),
      errors: summary.failures,
      skipped
    };
  }
}
