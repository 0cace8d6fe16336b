import { loadRegistry } from '../../lib/engine/registry';
import { extractRules, loadManifestFile, loadRuleFile, loadRuleFiles, parseDocuments } from '../../lib/policies/loader';
import { ConfigurationError, ErrorCode, hasErrorCode } from '../../lib/types/errors';
import { fixture } from '../helpers';

describe('Policy loader', () => {
  describe('parseDocuments', () => {
    test('parses every document of a stream', () => {
      const documents = parseDocuments('kind: Pod\n---\nkind: Service\n', 'inline');
      expect(documents).toEqual([{ kind: 'Pod' }, { kind: 'Service' }]);
    });

    test('parses JSON', () => {
      expect(parseDocuments('{"kind": "Pod", "spec": {"containers": []}}', 'inline')).toEqual([
        { kind: 'Pod', spec: { containers: [] } },
      ]);
    });

    test('skips empty documents', () => {
      expect(parseDocuments('---\n---\nkind: Pod\n', 'inline')).toEqual([{ kind: 'Pod' }]);
      expect(parseDocuments('', 'inline')).toEqual([]);
    });

    test('skips empty and comment-only documents between others', () => {
      const text = 'kind: Pod\n---\n---\n# nothing here\n---\nkind: Service\n';
      expect(parseDocuments(text, 'inline')).toEqual([{ kind: 'Pod' }, { kind: 'Service' }]);
    });

    test('keeps non-mapping documents for the evaluator to reject', () => {
      expect(parseDocuments('- a\n- b\n', 'inline')).toEqual([['a', 'b']]);
    });

    test('rejects a syntax error', () => {
      expect(() => parseDocuments('kind: Pod\nmetadata: [unterminated\n', 'inline.yaml')).toThrow(
        /^Cannot load 'inline\.yaml': /,
      );
    });
  });

  describe('extractRules', () => {
    test('accepts a bare list and a rules mapping', () => {
      const rules = extractRules([[{ id: 'a' }], { rules: [{ id: 'b' }, { id: 'c' }] }], 'inline');
      expect(rules).toEqual([{ id: 'a' }, { id: 'b' }, { id: 'c' }]);
    });

    test('names the offending document', () => {
      expect(() => extractRules([[], { rules: 'nope' }], 'rules.yaml')).toThrow(
        "Cannot load 'rules.yaml#2': expected a list of rules or a mapping with a rules list",
      );
    });
  });

  describe('rule files', () => {
    test('reads a rules mapping', async () => {
      const rules = await loadRuleFile(fixture('team-rules.yaml'));
      expect(rules).toHaveLength(1);
      expect(rules[0]).toMatchObject({ id: 'team-label', applicableKinds: ['Deployment', 'StatefulSet'] });
    });

    test('reads several files in order', async () => {
      const rules = await loadRuleFiles([fixture('service-rules.yaml'), fixture('team-rules.yaml')]);
      const registry = loadRegistry(rules);
      expect(registry.descriptors().map((d) => d.id)).toEqual([
        'service-ports',
        'service-no-external-ips',
        'team-label',
      ]);
    });

    test('rejects a file that holds no rules', async () => {
      const file = fixture('not-rules.yaml');
      await expect(loadRuleFile(file)).rejects.toThrow(
        `Cannot load '${file}#1': expected a list of rules or a mapping with a rules list`,
      );
    });

    test('leaves descriptor validation to the registry', async () => {
      const rules = await loadRuleFile(fixture('invalid-rules.yaml'));
      expect(rules).toHaveLength(1);

      let caught: unknown;
      try {
        loadRegistry(rules);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(hasErrorCode(caught, ErrorCode.RULE_INVALID)).toBe(true);
      expect(caught instanceof Error && caught.message).toBe(
        "Invalid rule descriptor broken-path: Invalid field path 'spec..containers': empty segment at position 5",
      );
    });

    test('reports a missing file', async () => {
      const file = fixture('does-not-exist.yaml');
      let caught: unknown;
      try {
        await loadRuleFile(file);
      } catch (error) {
        caught = error;
      }
      expect(hasErrorCode(caught, ErrorCode.POLICY_FILE_UNREADABLE)).toBe(true);
      expect(caught instanceof ConfigurationError && caught.field).toBe('file');
      expect(caught instanceof ConfigurationError && caught.message.startsWith(`Cannot load '${file}': ENOENT`)).toBe(
        true,
      );
    });
  });

  describe('manifest files', () => {
    test('numbers non-empty documents', async () => {
      const file = fixture('workloads.yaml');
      const documents = await loadManifestFile(file);

      expect(documents.map((d) => d.source)).toEqual([`${file}#1`, `${file}#2`]);
      expect(documents[0].document).toMatchObject({ kind: 'Deployment', spec: { replicas: 3 } });
      expect(documents[1].document).toMatchObject({ kind: 'Service', metadata: { name: 'web' } });
    });

    test('reads JSON manifests', async () => {
      const documents = await loadManifestFile(fixture('single-replica.json'));
      expect(documents).toHaveLength(1);
      expect(documents[0].document).toMatchObject({ kind: 'Deployment', metadata: { name: 'worker' } });
    });

    test('rejects a file with a syntax error', async () => {
      await expect(loadManifestFile(fixture('broken.yaml'))).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});
