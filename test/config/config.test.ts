import {
  applyExternalValues,
  baseConfig,
  getConfig,
  getDevConfig,
  getProductionConfig,
  getStagingConfig,
  isValidEnvironment,
  readExternalValues,
} from '../../config';
import { BUILTIN_RULE_IDS } from '../../lib/policies/catalog';
import { DeepPartial } from '../../lib/types/config';
import { ConfigurationError, ErrorCode } from '../../lib/types/errors';
import { deepMerge } from '../../lib/utils';

describe('Configuration System', () => {
  describe('deepMerge', () => {
    test('merges simple objects', () => {
      const base = { a: 1, b: 2 };
      const override = { b: 3 };
      const result = deepMerge(base, override);
      expect(result).toEqual({ a: 1, b: 3 });
    });

    test('merges nested objects', () => {
      const base = { a: { b: 1, c: 2 }, d: 3 };
      const override: DeepPartial<typeof base> = { a: { b: 10 } };
      const result = deepMerge(base, override);
      expect(result).toEqual({ a: { b: 10, c: 2 }, d: 3 });
    });

    test('replaces arrays instead of merging', () => {
      const base = { items: [1, 2, 3] };
      const override: DeepPartial<typeof base> = { items: [4, 5] };
      const result = deepMerge(base, override);
      expect(result.items).toEqual([4, 5]);
    });

    test('handles undefined values in override', () => {
      const base = { a: 1, b: 2 };
      const override: DeepPartial<typeof base> = { a: undefined };
      const result = deepMerge(base, override);
      expect(result.a).toBe(1); // undefined doesn't override
      expect(result.b).toBe(2);
    });

    test('does not mutate its inputs', () => {
      const base = { a: { b: 1 } };
      deepMerge(base, { a: { b: 2 } });
      expect(base.a.b).toBe(1);
    });
  });

  describe('baseConfig', () => {
    test('enables the whole catalog', () => {
      expect(baseConfig.catalog.enabledRules).toEqual([...BUILTIN_RULE_IDS]);
    });

    test('has sane evaluation defaults', () => {
      expect(baseConfig.evaluation.includeSkipped).toBe(false);
      expect(baseConfig.evaluation.timeoutMs).toBeGreaterThan(0);
    });
  });

  describe('devConfig', () => {
    const devConfig = getDevConfig();

    test('sets environment to dev', () => {
      expect(devConfig.environment).toBe('dev');
    });

    test('has relaxed catalog settings', () => {
      expect(devConfig.catalog.minReplicas).toBe(1);
      expect(devConfig.catalog.mandatoryLabels).toEqual(['app.kubernetes.io/name']);
      expect(devConfig.catalog.enabledRules).not.toContain('container-liveness-probe');
    });

    test('inherits unchanged values', () => {
      expect(devConfig.catalog.hpaAnnotation).toBe(baseConfig.catalog.hpaAnnotation);
      expect(devConfig.catalog.topologySpreadReplicaThreshold).toBe(2);
    });

    test('logs at debug without a deadline', () => {
      expect(devConfig.logging.level).toBe('debug');
      expect(devConfig.evaluation.timeoutMs).toBe(0);
    });
  });

  describe('stagingConfig', () => {
    test('reports skipped rules', () => {
      const stagingConfig = getStagingConfig();
      expect(stagingConfig.environment).toBe('staging');
      expect(stagingConfig.evaluation.includeSkipped).toBe(true);
      expect(stagingConfig.catalog).toEqual(baseConfig.catalog);
    });
  });

  describe('productionConfig', () => {
    const prodConfig = getProductionConfig();

    test('sets environment to production', () => {
      expect(prodConfig.environment).toBe('production');
    });

    test('has high availability requirements', () => {
      expect(prodConfig.catalog.minReplicas).toBe(3);
      expect(prodConfig.catalog.enabledRules).toHaveLength(BUILTIN_RULE_IDS.length);
    });

    test('requires the version label', () => {
      expect(prodConfig.catalog.mandatoryLabels).toContain('app.kubernetes.io/version');
    });

    test('logs warnings and above', () => {
      expect(prodConfig.logging.level).toBe('warn');
    });
  });

  describe('getConfig', () => {
    test.each(['dev', 'staging', 'production'] as const)('returns %s config', (environment) => {
      expect(getConfig(environment).environment).toBe(environment);
    });

    test('applies external values', () => {
      const config = getConfig('production', { minReplicas: 5, logLevel: 'error' });
      expect(config.catalog.minReplicas).toBe(5);
      expect(config.logging.level).toBe('error');
    });

    test('rejects an invalid merged configuration', () => {
      let caught: unknown;
      try {
        getConfig('dev', { minReplicas: 0 });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught instanceof ConfigurationError && caught.code).toBe(ErrorCode.CONFIG_INVALID);
      expect(caught instanceof ConfigurationError && caught.issues).toEqual([
        'catalog.minReplicas: Number must be greater than or equal to 1',
      ]);
    });
  });

  describe('isValidEnvironment', () => {
    test('returns true for valid environments', () => {
      expect(isValidEnvironment('dev')).toBe(true);
      expect(isValidEnvironment('staging')).toBe(true);
      expect(isValidEnvironment('production')).toBe(true);
    });

    test('returns false for invalid environments', () => {
      expect(isValidEnvironment('test')).toBe(false);
      expect(isValidEnvironment('prod')).toBe(false);
      expect(isValidEnvironment('')).toBe(false);
    });
  });

  describe('readExternalValues', () => {
    test('returns nothing for an empty environment', () => {
      expect(readExternalValues({})).toEqual({});
    });

    test('reads every supported variable', () => {
      expect(
        readExternalValues({ LOG_LEVEL: ' Debug ', POLICY_TIMEOUT_MS: '250', POLICY_MIN_REPLICAS: '4' }),
      ).toEqual({ logLevel: 'debug', timeoutMs: 250, minReplicas: 4 });
    });

    test('ignores empty variables', () => {
      expect(readExternalValues({ LOG_LEVEL: '', POLICY_TIMEOUT_MS: '  ' })).toEqual({});
    });

    test('rejects an unknown log level', () => {
      expect(() => readExternalValues({ LOG_LEVEL: 'loud' })).toThrow(
        "LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent, got 'loud'",
      );
    });

    test.each([
      ['POLICY_TIMEOUT_MS', '-1', "POLICY_TIMEOUT_MS must be an integer >= 0, got '-1'"],
      ['POLICY_TIMEOUT_MS', '1.5', "POLICY_TIMEOUT_MS must be an integer >= 0, got '1.5'"],
      ['POLICY_MIN_REPLICAS', '0', "POLICY_MIN_REPLICAS must be an integer >= 1, got '0'"],
      ['POLICY_MIN_REPLICAS', 'three', "POLICY_MIN_REPLICAS must be an integer >= 1, got 'three'"],
    ])('rejects %s=%s', (name, raw, message) => {
      expect(() => readExternalValues({ [name]: raw })).toThrow(message);
    });
  });

  describe('applyExternalValues', () => {
    const config = getProductionConfig();

    test('returns the config unchanged without values', () => {
      expect(applyExternalValues(config)).toBe(config);
      expect(applyExternalValues(config, {})).toEqual(config);
    });

    test('overrides only the provided values', () => {
      const result = applyExternalValues(config, { timeoutMs: 100 });
      expect(result.evaluation.timeoutMs).toBe(100);
      expect(result.evaluation.includeSkipped).toBe(config.evaluation.includeSkipped);
      expect(result.catalog).toBe(config.catalog);
    });
  });
});
