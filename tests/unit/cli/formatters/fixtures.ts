import type { RunReport } from '../../../../src/cli/types.js';
import type { ValidationSummary } from '../../../../src/types/validation.js';

export function summaryOf(matched: number, total: number): ValidationSummary {
  return {
    attributes: [],
    matched,
    total,
    failures: total - matched,
    events: matched,
    unknownEvents: 0,
    satisfied: matched === total
  };
}

export function runReport(): RunReport {
  return {
    summary: {
      results: [
        {
          name: 'login',
          passed: true,
          status: 'passed',
          seed: 7,
          durationMs: 1200,
          states: [
            {
              name: 'ready',
              description: '',
              status: 'completed',
              passed: true,
              summary: summaryOf(1, 1),
              report: 'ok',
              durationMs: 300
            }
          ]
        },
        {
          name: 'logout',
          passed: false,
          status: 'failed',
          durationMs: 500,
          states: [
            {
              name: 'bye',
              description: 'Client leaves',
              status: 'timed_out',
              passed: false,
              summary: summaryOf(0, 1),
              report: 'line1\nline2',
              durationMs: 200
            }
          ]
        }
      ],
      failures: [{ name: 'crash', error: 'boom' }],
      passed: false,
      cancelled: false,
      durationMs: 1500
    },
    skipped: [{ name: 'bad', source: 'bad.yml', error: 'oops' }]
  };
}
