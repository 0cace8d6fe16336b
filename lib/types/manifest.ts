/**
 * Kubernetes manifest type definitions
 *
 * The engine treats every manifest as an untyped document tree and reads it
 * through field paths, so nothing here is required at evaluation time. These
 * types describe the workload shapes the built-in catalog targets and give
 * tests and callers type-safe builders.
 */

import { isMapping } from '../utils';

/**
 * Workload kinds the built-in catalog knows how to inspect.
 */
export type WorkloadKind = 'Pod' | 'Deployment' | 'DaemonSet' | 'StatefulSet';

/**
 * All workload kinds, in catalog order.
 */
export const WORKLOAD_KINDS: readonly WorkloadKind[] = ['Pod', 'Deployment', 'DaemonSet', 'StatefulSet'];

/**
 * Sibling keys of a pod spec holding container lists.
 */
export const CONTAINER_FIELDS = ['containers', 'initContainers', 'ephemeralContainers'] as const;

/**
 * Standard object metadata
 */
export interface ObjectMeta {
  readonly name?: string;
  readonly namespace?: string;
  readonly labels?: Record<string, string>;
  readonly annotations?: Record<string, string>;
}

/**
 * Resource quantity (CPU, memory, storage)
 *
 * @example
 * ```typescript
 * const requests: ResourceList = { cpu: '100m', memory: '256Mi' };
 * ```
 */
export type ResourceList = Record<string, string>;

/**
 * Compute resources of a container
 */
export interface ResourceRequirements {
  readonly requests?: ResourceList;
  readonly limits?: ResourceList;
}

/**
 * Liveness/readiness/startup probe (only the handler keys the catalog reads)
 */
export interface Probe {
  readonly httpGet?: { readonly path?: string; readonly port: number | string };
  readonly tcpSocket?: { readonly port: number | string };
  readonly exec?: { readonly command: string[] };
  readonly initialDelaySeconds?: number;
  readonly periodSeconds?: number;
}

/**
 * Container security settings
 */
export interface SecurityContext {
  readonly privileged?: boolean;
  readonly runAsNonRoot?: boolean;
  readonly readOnlyRootFilesystem?: boolean;
  readonly allowPrivilegeEscalation?: boolean;
}

/**
 * A single container
 */
export interface Container {
  readonly name: string;
  readonly image?: string;
  readonly resources?: ResourceRequirements;
  readonly livenessProbe?: Probe;
  readonly readinessProbe?: Probe;
  readonly securityContext?: SecurityContext;
}

/**
 * Label selector for Kubernetes resources
 */
export interface LabelSelector {
  /** Equality-based label requirements */
  readonly matchLabels?: Record<string, string>;
}

/**
 * Topology spread constraint of a pod spec
 *
 * @see https://kubernetes.io/docs/concepts/scheduling-eviction/topology-spread-constraints/
 */
export interface TopologySpreadConstraint {
  readonly maxSkew: number;
  readonly topologyKey: string;
  readonly whenUnsatisfiable: 'DoNotSchedule' | 'ScheduleAnyway';
  readonly labelSelector?: LabelSelector;
}

/**
 * Pod specification
 */
export interface PodSpec {
  readonly containers: Container[];
  readonly initContainers?: Container[];
  readonly ephemeralContainers?: Container[];
  readonly topologySpreadConstraints?: TopologySpreadConstraint[];
  readonly hostNetwork?: boolean;
}

/**
 * Pod template embedded in workload controllers
 */
export interface PodTemplateSpec {
  readonly metadata?: ObjectMeta;
  readonly spec: PodSpec;
}

/**
 * Bare Pod resource definition
 */
export interface Pod {
  readonly apiVersion: 'v1';
  readonly kind: 'Pod';
  readonly metadata: ObjectMeta;
  readonly spec: PodSpec;
}

/**
 * Deployment, DaemonSet or StatefulSet resource definition
 */
export interface WorkloadController {
  readonly apiVersion: 'apps/v1';
  readonly kind: Exclude<WorkloadKind, 'Pod'>;
  readonly metadata: ObjectMeta;
  readonly spec: {
    readonly replicas?: number;
    readonly selector?: LabelSelector;
    readonly template: PodTemplateSpec;
  };
}

/**
 * Builds a display reference such as `Deployment/web` or `Pod/<unnamed>`.
 *
 * @param manifest - A structurally valid manifest
 */
export function describeManifest(manifest: Readonly<Record<string, unknown>>): string {
  const metadata = manifest.metadata;
  const name = isMapping(metadata) && typeof metadata.name === 'string' ? metadata.name : '<unnamed>';
  return `${String(manifest.kind)}/${name}`;
}
