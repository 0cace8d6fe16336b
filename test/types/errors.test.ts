import {
  ConfigurationError,
  ErrorCode,
  EvaluationCancelledError,
  hasErrorCode,
  isPolicyEngineError,
  PolicyEngineError,
  StructuralError,
} from '../../lib/types/errors';

describe('Errors', () => {
  describe('PolicyEngineError', () => {
    test('defaults to UNKNOWN and error severity', () => {
      const error = new PolicyEngineError('something broke');
      expect(error.code).toBe(ErrorCode.UNKNOWN);
      expect(error.severity).toBe('error');
      expect(error.context).toEqual({});
      expect(error).toBeInstanceOf(Error);
    });

    test('formats a log line with its context', () => {
      const error = new PolicyEngineError('boom', ErrorCode.RULE_INVALID, 'warning', {
        component: 'RuleRegistry',
        operation: 'load',
        resource: 'team-label',
      });
      expect(error.toLogString()).toBe(
        '[WARNING] [RULE_INVALID] boom component=RuleRegistry operation=load resource=team-label',
      );
    });

    test('serializes to JSON', () => {
      const json = new PolicyEngineError('boom').toJSON();
      expect(json).toMatchObject({ name: 'PolicyEngineError', message: 'boom', code: 'UNKNOWN', severity: 'error' });
      expect(typeof json.timestamp).toBe('string');
    });

    test('wraps unknown errors', () => {
      const wrapped = PolicyEngineError.wrap(new TypeError('bad input'), { component: 'Evaluator' });
      expect(wrapped.message).toBe('bad input');
      expect(wrapped.code).toBe(ErrorCode.UNKNOWN);
      expect(wrapped.context.component).toBe('Evaluator');
      expect(wrapped.context.originalStack).toContain('TypeError');

      expect(PolicyEngineError.wrap('plain string').message).toBe('plain string');
    });

    test('returns engine errors unchanged from wrap', () => {
      const error = StructuralError.kindMissing();
      expect(PolicyEngineError.wrap(error)).toBe(error);
    });
  });

  describe('StructuralError', () => {
    test.each([
      [null, 'Manifest root must be a mapping, got null'],
      [[1, 2], 'Manifest root must be a mapping, got array'],
      ['kind: Pod', 'Manifest root must be a mapping, got string'],
      [42, 'Manifest root must be a mapping, got number'],
    ])('describes a %p root', (root, message) => {
      const error = StructuralError.notAnObject(root);
      expect(error.message).toBe(message);
      expect(error.code).toBe(ErrorCode.MANIFEST_NOT_OBJECT);
    });

    test('reports a missing kind', () => {
      const error = StructuralError.kindMissing();
      expect(error.message).toBe('Manifest has no kind');
      expect(error.code).toBe(ErrorCode.MANIFEST_KIND_MISSING);
      expect(error.context).toMatchObject({ component: 'Evaluator', operation: 'evaluate' });
      expect(error.name).toBe('StructuralError');
    });
  });

  describe('ConfigurationError', () => {
    test('joins rule issues into the message', () => {
      const error = ConfigurationError.invalidRule('rules[2]', ['id: Required', 'predicate: Required']);
      expect(error.message).toBe('Invalid rule descriptor rules[2]: id: Required; predicate: Required');
      expect(error.issues).toEqual(['id: Required', 'predicate: Required']);
      expect(error.code).toBe(ErrorCode.RULE_INVALID);
      expect(error.context.component).toBe('RuleRegistry');
    });

    test('reports a duplicate rule', () => {
      const error = ConfigurationError.duplicateRule('host-network');
      expect(error.message).toBe("Rule 'host-network' is already registered");
      expect(error.code).toBe(ErrorCode.RULE_DUPLICATE_ID);
    });

    test('reports an invalid field path', () => {
      const error = ConfigurationError.invalidFieldPath('spec[', 'unterminated bracket');
      expect(error.message).toBe("Invalid field path 'spec[': unterminated bracket");
      expect(error.field).toBe('path');
      expect(error.value).toBe('spec[');
    });

    test('reports an unreadable file', () => {
      const error = ConfigurationError.unreadableFile('rules.yaml', 'no such file');
      expect(error.message).toBe("Cannot load 'rules.yaml': no such file");
      expect(error.context.resource).toBe('rules.yaml');
      expect(error.code).toBe(ErrorCode.POLICY_FILE_UNREADABLE);
    });
  });

  describe('EvaluationCancelledError', () => {
    test('includes the reason', () => {
      const error = new EvaluationCancelledError('Pod/web', 3, new Error('timed out'));
      expect(error.message).toBe('Evaluation of Pod/web cancelled: timed out');
      expect(error.completedRules).toBe(3);
      expect(error.severity).toBe('warning');
    });

    test('omits a missing reason', () => {
      expect(new EvaluationCancelledError('Pod/web', 0).message).toBe('Evaluation of Pod/web cancelled');
    });
  });

  describe('type guards', () => {
    test('recognizes engine errors', () => {
      expect(isPolicyEngineError(StructuralError.kindMissing())).toBe(true);
      expect(isPolicyEngineError(new Error('plain'))).toBe(false);
    });

    test('matches error codes', () => {
      const error = ConfigurationError.duplicateRule('a');
      expect(hasErrorCode(error, ErrorCode.RULE_DUPLICATE_ID)).toBe(true);
      expect(hasErrorCode(error, ErrorCode.RULE_INVALID)).toBe(false);
      expect(hasErrorCode('RULE_DUPLICATE_ID', ErrorCode.RULE_DUPLICATE_ID)).toBe(false);
    });
  });
});
