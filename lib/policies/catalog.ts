/**
 * Built-in rule catalog.
 *
 * Each entry builds a plain {@link RuleDescriptor} from the catalog
 * configuration, so the built-in rules go through exactly the same
 * validation and compilation as rules loaded from files.
 *
 * @module policies/catalog
 */

import type { CatalogConfig } from '../types/config';
import { CONTAINER_FIELDS, WORKLOAD_KINDS } from '../types/manifest';
import { Predicate, RuleDescriptor } from '../types/policy';

/**
 * Ids of the built-in rules, in their default evaluation order.
 */
export const BUILTIN_RULE_IDS = [
  'container-cpu-requests',
  'container-memory-requests',
  'container-memory-limits',
  'container-liveness-probe',
  'container-readiness-probe',
  'mandatory-labels',
  'deployment-min-replicas',
  'deployment-topology-spread',
  'hpa-requests',
  'privileged-containers',
  'privilege-escalation',
  'host-network',
] as const;

export type BuiltinRuleId = (typeof BUILTIN_RULE_IDS)[number];

/**
 * Type guard for built-in rule ids.
 */
export function isBuiltinRuleId(id: string): id is BuiltinRuleId {
  return (BUILTIN_RULE_IDS as readonly string[]).includes(id);
}

// =============================================================================
// Container paths
// =============================================================================

/** Every container of a bare Pod */
export const POD_CONTAINERS = `spec.{${CONTAINER_FIELDS.join(',')}}[*]`;

/** Every container of a workload controller's pod template */
export const TEMPLATE_CONTAINERS = `spec.template.${POD_CONTAINERS}`;

const ALL_CONTAINERS = [POD_CONTAINERS, TEMPLATE_CONTAINERS];

// Probes only make sense on long-running containers.
const REGULAR_CONTAINERS = ['spec.containers[*]', 'spec.template.spec.containers[*]'];

const CONTROLLER_KINDS = ['Deployment', 'StatefulSet'];

/**
 * Predicate holding when every container satisfies `where`, and at least one container exists.
 */
function everyContainer(where: Predicate, paths: readonly string[] = ALL_CONTAINERS): Predicate {
  return { op: 'countWhere', paths, where, operator: '==', threshold: 'all', nonEmpty: true };
}

function containerFieldRule(id: BuiltinRuleId, field: string, label: string): RuleDescriptor {
  return {
    id,
    title: `Containers set ${label}`,
    applicableKinds: WORKLOAD_KINDS,
    defaultVerdict: 'fail',
    predicate: everyContainer({ op: 'exists', path: field }),
    currentMessageTemplate: `${label} set on: {matched}; missing on: {unmatched}`,
    expectedMessageTemplate: `Every container of {kind} {name} sets ${field}`,
    severity: 'error',
    category: 'reliability',
  };
}

function probeRule(id: BuiltinRuleId, probe: string, label: string): RuleDescriptor {
  return {
    id,
    title: `Containers declare a ${label}`,
    applicableKinds: WORKLOAD_KINDS,
    defaultVerdict: 'fail',
    predicate: everyContainer({ op: 'exists', path: probe }, REGULAR_CONTAINERS),
    currentMessageTemplate: `${label} declared on: {matched}; missing on: {unmatched}`,
    expectedMessageTemplate: `Every container of {kind} {name} declares ${probe}`,
    severity: 'warning',
    category: 'reliability',
  };
}

type CatalogEntry = (config: CatalogConfig) => RuleDescriptor | undefined;

const CATALOG: Record<BuiltinRuleId, CatalogEntry> = {
  'container-cpu-requests': () => containerFieldRule('container-cpu-requests', 'resources.requests.cpu', 'CPU requests'),

  'container-memory-requests': () =>
    containerFieldRule('container-memory-requests', 'resources.requests.memory', 'Memory requests'),

  'container-memory-limits': () =>
    containerFieldRule('container-memory-limits', 'resources.limits.memory', 'Memory limits'),

  'container-liveness-probe': () => probeRule('container-liveness-probe', 'livenessProbe', 'Liveness probe'),

  'container-readiness-probe': () => probeRule('container-readiness-probe', 'readinessProbe', 'Readiness probe'),

  // An empty label list leaves nothing to check.
  'mandatory-labels': (config) =>
    config.mandatoryLabels.length === 0
      ? undefined
      : {
          id: 'mandatory-labels',
          title: 'Workloads carry the mandatory labels',
          applicableKinds: WORKLOAD_KINDS,
          defaultVerdict: 'fail',
          predicate: { op: 'missingKeys', path: 'metadata.labels', required: config.mandatoryLabels },
          currentMessageTemplate: 'Missing labels: {missing}',
          expectedMessageTemplate: `Labels ${config.mandatoryLabels.join(', ')} are set`,
          severity: 'warning',
          category: 'compliance',
        },

  'deployment-min-replicas': (config) => ({
    id: 'deployment-min-replicas',
    title: 'Controllers run enough replicas',
    applicableKinds: CONTROLLER_KINDS,
    defaultVerdict: 'fail',
    predicate: { op: 'compare', path: 'spec.replicas', operator: '>=', value: config.minReplicas },
    currentMessageTemplate: '{kind} {name} runs {spec.replicas} replica(s)',
    expectedMessageTemplate: `At least ${config.minReplicas} replicas`,
    severity: 'error',
    category: 'reliability',
  }),

  // An unset replica count defaults to 1, which never needs spreading. An
  // empty constraint list spreads nothing.
  'deployment-topology-spread': (config) => ({
    id: 'deployment-topology-spread',
    title: 'Replicated controllers spread across topology domains',
    applicableKinds: CONTROLLER_KINDS,
    defaultVerdict: 'fail',
    predicate: {
      op: 'or',
      predicates: [
        { op: 'not', predicate: { op: 'exists', path: 'spec.replicas' } },
        {
          op: 'compare',
          path: 'spec.replicas',
          operator: '<=',
          value: config.topologySpreadReplicaThreshold,
        },
        {
          op: 'countWhere',
          paths: ['spec.template.spec.topologySpreadConstraints[*]'],
          where: { op: 'exists', path: 'topologyKey' },
          operator: '>=',
          threshold: 1,
          nonEmpty: true,
        },
      ],
    },
    currentMessageTemplate:
      '{kind} {name} runs {spec.replicas} replica(s) with topology spread constraints: ' +
      '{spec.template.spec.topologySpreadConstraints}',
    expectedMessageTemplate:
      `Topology spread constraints when running more than ${config.topologySpreadReplicaThreshold} replicas`,
    severity: 'warning',
    category: 'reliability',
  }),

  // Violation-style: the predicate describes an autoscaled controller
  // with a container lacking CPU or memory requests.
  'hpa-requests': (config) => ({
    id: 'hpa-requests',
    title: 'Autoscaled controllers set resource requests',
    applicableKinds: CONTROLLER_KINDS,
    defaultVerdict: 'pass',
    predicate: {
      op: 'and',
      predicates: [
        { op: 'exists', path: `metadata.annotations[${JSON.stringify(config.hpaAnnotation)}]` },
        {
          op: 'countWhere',
          paths: [TEMPLATE_CONTAINERS],
          where: {
            op: 'and',
            predicates: [
              { op: 'exists', path: 'resources.requests.cpu' },
              { op: 'exists', path: 'resources.requests.memory' },
            ],
          },
          operator: '<',
          threshold: 'all',
          nonEmpty: false,
        },
      ],
    },
    currentMessageTemplate: 'Containers without CPU and memory requests: {unmatched}',
    expectedMessageTemplate: `Containers of {kind} {name} set CPU and memory requests when annotated ${config.hpaAnnotation}`,
    severity: 'error',
    category: 'performance',
  }),

  // Violation-style: the predicate holds when any container is privileged.
  'privileged-containers': () => ({
    id: 'privileged-containers',
    title: 'Containers do not run privileged',
    applicableKinds: WORKLOAD_KINDS,
    defaultVerdict: 'pass',
    predicate: {
      op: 'countWhere',
      paths: ALL_CONTAINERS,
      where: { op: 'equals', path: 'securityContext.privileged', value: true },
      operator: '>=',
      threshold: 1,
      nonEmpty: false,
    },
    currentMessageTemplate: 'Privileged containers: {matched}',
    expectedMessageTemplate: 'No container sets securityContext.privileged',
    severity: 'error',
    category: 'security',
  }),

  'privilege-escalation': () => ({
    id: 'privilege-escalation',
    title: 'Containers do not allow privilege escalation',
    applicableKinds: WORKLOAD_KINDS,
    defaultVerdict: 'pass',
    predicate: {
      op: 'countWhere',
      paths: ALL_CONTAINERS,
      where: { op: 'equals', path: 'securityContext.allowPrivilegeEscalation', value: true },
      operator: '>=',
      threshold: 1,
      nonEmpty: false,
    },
    currentMessageTemplate: 'Containers allowing privilege escalation: {matched}',
    expectedMessageTemplate: 'No container sets securityContext.allowPrivilegeEscalation to true',
    severity: 'error',
    category: 'security',
  }),

  'host-network': () => ({
    id: 'host-network',
    title: 'Pods do not share the host network',
    applicableKinds: WORKLOAD_KINDS,
    defaultVerdict: 'pass',
    predicate: {
      op: 'or',
      predicates: [
        { op: 'equals', path: 'spec.hostNetwork', value: true },
        { op: 'equals', path: 'spec.template.spec.hostNetwork', value: true },
      ],
    },
    currentMessageTemplate: '{kind} {name} uses the host network',
    expectedMessageTemplate: 'spec.hostNetwork unset or false',
    severity: 'error',
    category: 'security',
  }),
};

/**
 * Build the descriptors of the enabled built-in rules.
 *
 * @example
 * ```typescript
 * const registry = RuleRegistry.fromDescriptors(buildCatalog(getConfig('production').catalog));
 * ```
 */
export function buildCatalog(config: CatalogConfig): RuleDescriptor[] {
  const descriptors: RuleDescriptor[] = [];
  for (const id of config.enabledRules) {
    const descriptor = CATALOG[id](config);
    if (descriptor !== undefined) {
      descriptors.push(descriptor);
    }
  }
  return descriptors;
}
