/**
 * Result reporter: verdict rendering, summaries and the CLI text format.
 *
 * @module engine/reporter
 */

import { RuleSeverity, Verdict, VerdictResult } from '../types/policy';

/**
 * The caller-facing triple of a verdict.
 */
export interface RenderedVerdict {
  readonly result: VerdictResult;
  readonly currentConfiguration: string;
  readonly expectedConfiguration: string;
}

/**
 * Aggregate of a verdict list.
 */
export interface Summary {
  /** `fail` if any verdict fails, else `pass` if any passes, else `skip` */
  readonly result: VerdictResult;
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly skipped: number;
  /** Failing rule ids, in verdict order, without repeats */
  readonly failingRuleIds: readonly string[];
}

/**
 * Verdicts of one resource, as shown in a report.
 */
export interface ResourceReport {
  /** e.g. `Deployment/web`, or the source of a rejected document */
  readonly resource: string;
  readonly verdicts: readonly Verdict[];
}

/**
 * A complete scan report.
 */
export interface Report {
  readonly resources: readonly ResourceReport[];
  readonly summary: Summary;
}

const RESULT_LABEL: Record<VerdictResult, string> = {
  pass: 'PASS',
  fail: 'FAIL',
  skip: 'SKIP',
};

/**
 * Strip a verdict down to result and configuration strings.
 */
export function render(verdict: Verdict): RenderedVerdict {
  return {
    result: verdict.result,
    currentConfiguration: verdict.currentConfiguration,
    expectedConfiguration: verdict.expectedConfiguration,
  };
}

/**
 * Count verdicts by result.
 *
 * @example
 * ```typescript
 * summarize([]).result; // 'skip'
 * ```
 */
export function summarize(verdicts: readonly Verdict[]): Summary {
  const passed = verdicts.filter((verdict) => verdict.result === 'pass').length;
  const failed = verdicts.filter((verdict) => verdict.result === 'fail').length;
  const failingRuleIds = [
    ...new Set(verdicts.filter((verdict) => verdict.result === 'fail').map((verdict) => verdict.ruleId)),
  ];

  return {
    result: failed > 0 ? 'fail' : passed > 0 ? 'pass' : 'skip',
    total: verdicts.length,
    passed,
    failed,
    skipped: verdicts.length - passed - failed,
    failingRuleIds,
  };
}

/**
 * Assemble a report from per-resource verdicts.
 */
export function buildReport(resources: readonly ResourceReport[]): Report {
  return {
    resources,
    summary: summarize(resources.flatMap((resource) => resource.verdicts)),
  };
}

function severityTag(severity: RuleSeverity | undefined): string {
  return severity === undefined ? '' : ` (${severity})`;
}

/**
 * Plain-text report, one line per verdict, grouped by resource.
 *
 * ```
 * Deployment/web
 *   FAIL deployment-min-replicas (error): web runs 1 replica(s) | expected: At least 2 replicas
 *
 * 1 verdicts: 0 passed, 1 failed, 0 skipped => FAIL
 * ```
 */
export function formatText(report: Report): string {
  const lines: string[] = [];

  for (const resource of report.resources) {
    lines.push(resource.resource);
    for (const verdict of resource.verdicts) {
      lines.push(
        `  ${RESULT_LABEL[verdict.result]} ${verdict.ruleId}${severityTag(verdict.severity)}: ` +
          `${verdict.currentConfiguration} | expected: ${verdict.expectedConfiguration}`,
      );
    }
    lines.push('');
  }

  const { summary } = report;
  lines.push(
    `${summary.total} verdicts: ${summary.passed} passed, ${summary.failed} failed, ` +
      `${summary.skipped} skipped => ${RESULT_LABEL[summary.result]}`,
  );
  return lines.join('\n');
}
