import { buildReport, formatText, render, summarize } from '../../lib/engine/reporter';
import { Verdict } from '../../lib/types/policy';

const pass: Verdict = {
  ruleId: 'container-cpu-requests',
  result: 'pass',
  currentConfiguration: 'CPU requests set on: app; missing on: none',
  expectedConfiguration: 'Every container of Pod web sets resources.requests.cpu',
  severity: 'error',
  resource: 'Pod/web',
};

const fail: Verdict = {
  ruleId: 'deployment-min-replicas',
  result: 'fail',
  currentConfiguration: 'Deployment api runs 1 replica(s)',
  expectedConfiguration: 'At least 2 replicas',
  severity: 'error',
  resource: 'Deployment/api',
};

const skip: Verdict = {
  ruleId: 'no-applicable-rules',
  result: 'skip',
  currentConfiguration: 'No rules registered for kind Service',
  expectedConfiguration: 'A kind with rules: Pod',
};

describe('Result Reporter', () => {
  describe('render', () => {
    test('keeps result and configuration strings only', () => {
      expect(render(fail)).toEqual({
        result: 'fail',
        currentConfiguration: 'Deployment api runs 1 replica(s)',
        expectedConfiguration: 'At least 2 replicas',
      });
    });
  });

  describe('summarize', () => {
    test('fails when any verdict fails', () => {
      expect(summarize([pass, fail, skip, fail])).toEqual({
        result: 'fail',
        total: 4,
        passed: 1,
        failed: 2,
        skipped: 1,
        failingRuleIds: ['deployment-min-replicas'],
      });
    });

    test('passes when nothing fails and something passes', () => {
      expect(summarize([skip, pass]).result).toBe('pass');
    });

    test('skips when every verdict is a skip', () => {
      expect(summarize([skip]).result).toBe('skip');
    });

    test('skips an empty list', () => {
      expect(summarize([])).toEqual({ result: 'skip', total: 0, passed: 0, failed: 0, skipped: 0, failingRuleIds: [] });
    });
  });

  describe('formatText', () => {
    test('prints one line per verdict grouped by resource, then the summary', () => {
      const report = buildReport([
        { resource: 'Pod/web (pods.yaml#1)', verdicts: [pass] },
        { resource: 'Service/web (pods.yaml#2)', verdicts: [skip] },
        { resource: 'Deployment/api (api.yaml#1)', verdicts: [fail] },
      ]);

      expect(formatText(report).split('\n')).toEqual([
        'Pod/web (pods.yaml#1)',
        '  PASS container-cpu-requests (error): CPU requests set on: app; missing on: none | expected: Every container of Pod web sets resources.requests.cpu',
        '',
        'Service/web (pods.yaml#2)',
        '  SKIP no-applicable-rules: No rules registered for kind Service | expected: A kind with rules: Pod',
        '',
        'Deployment/api (api.yaml#1)',
        '  FAIL deployment-min-replicas (error): Deployment api runs 1 replica(s) | expected: At least 2 replicas',
        '',
        '3 verdicts: 1 passed, 1 failed, 1 skipped => FAIL',
      ]);
    });
  });
});
