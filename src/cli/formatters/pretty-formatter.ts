/**
 * Pretty formátter pro CLI výstup - lidsky čitelný formát.
 */

import type { FormattableData, RunReport, ValidationReport } from '../types.js';
import type { OutputFormatter } from './index.js';
import type { StateResult } from '../../types/state.js';
import type { TestResult } from '../../types/test.js';
import { colorize, type ColorName } from '../../utils/colors.js';
import { formatDuration } from '../../utils/duration-parser.js';

const STATUS_COLORS: Record<StateResult['status'] | TestResult['status'], ColorName> = {
  pending: 'dim',
  running: 'blue',
  completed: 'green',
  passed: 'green',
  timed_out: 'yellow',
  cancelled: 'yellow',
  failed: 'red',
  error: 'red'
};

export class PrettyFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'run':
        return this.formatRun(data.data);
      case 'validation':
        return this.formatValidation(data.data);
      case 'error':
        return this.color('✗ ', 'red') + this.color(data.data, 'red');
      case 'message':
        return data.data;
    }
  }

  private formatRun({ summary, skipped }: RunReport): string {
    const lines: string[] = [];

    for (const test of summary.results) {
      lines.push(this.formatTest(test), '');
    }

    for (const failure of summary.failures) {
      lines.push(`${this.color('✗', 'red')} ${this.color(failure.name, 'bold')} ${this.color(failure.error, 'red')}`, '');
    }

    for (const test of skipped) {
      lines.push(`${this.color('○', 'dim')} ${test.name} ${this.color(`skipped: ${test.error}`, 'yellow')}`);
    }
    if (skipped.length > 0) lines.push('');

    const passed = summary.results.filter((test) => test.passed).length;
    const failed = summary.results.length - passed + summary.failures.length;
    const parts = [
      this.color(`${passed} passed`, passed > 0 ? 'green' : 'dim'),
      this.color(`${failed} failed`, failed > 0 ? 'red' : 'dim')
    ];
    if (skipped.length > 0) {
      parts.push(this.color(`${skipped.length} skipped`, 'yellow'));
    }
    lines.push(`Tests: ${parts.join(', ')} (${formatDuration(summary.durationMs)})`);
    if (summary.cancelled) {
      lines.push(this.color('Run was interrupted', 'yellow'));
    }

    return lines.join('\n');
  }

  private formatTest(test: TestResult): string {
    const icon = test.passed ? this.color('✓', 'green') : this.color('✗', 'red');
    const seed = test.seed !== undefined ? this.color(` seed=${test.seed}`, 'dim') : '';
    const lines = [
      `${icon} ${this.color(test.name, 'bold')} ${this.status(test.status)} ${this.color(`(${formatDuration(test.durationMs)})`, 'dim')}${seed}`
    ];

    for (const state of test.states) {
      const stateIcon = state.passed ? this.color('✓', 'green') : this.color('✗', 'red');
      const counts = `${state.summary.matched}/${state.summary.total} matched`;
      lines.push(
        `  ${stateIcon} ${state.name} ${this.status(state.status)} ${this.color(`${counts}, ${formatDuration(state.durationMs)}`, 'dim')}`
      );
      if (state.error !== undefined) {
        lines.push(`      ${this.color(state.error, 'red')}`);
      }
      if (!state.passed) {
        lines.push(...state.report.split('\n').map((line) => `      ${line}`));
      }
    }

    return lines.join('\n');
  }

  private formatValidation(report: ValidationReport): string {
    const lines: string[] = [];

    for (const test of report.tests) {
      lines.push(`${this.color('✓', 'green')} ${this.color(test.name, 'bold')} ${this.color(`(${test.states.length} state(s): ${test.states.join(', ')})`, 'dim')}`);
    }
    for (const test of report.skipped) {
      lines.push(`${this.color('✗', 'red')} ${this.color(test.name, 'bold')} ${this.color(test.error, 'red')}`);
    }

    lines.push('');
    lines.push(
      report.skipped.length === 0
        ? this.color(`All ${report.tests.length} test(s) are valid`, 'green')
        : this.color(`${report.skipped.length} of ${report.tests.length + report.skipped.length} test(s) are invalid`, 'red')
    );

    return lines.join('\n');
  }

  private status(status: TestResult['status'] | StateResult['status']): string {
    return this.color(status.replace('_', ' '), STATUS_COLORS[status]);
  }

  private color(text: string, style: ColorName): string {
    return this.useColors ? colorize(text, style) : text;
  }
}
