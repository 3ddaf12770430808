/**
 * Kubernetes cluster adapter - nodes from the core API, pull jobs as
 * DaemonSets
 */

import * as k8s from '@kubernetes/client-node';
import { ClusterError, PullJobNotFoundError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { ClusterNode, PullJobHandle, PullJobSpec, PullJobStatus } from '../types';
import { ClusterPort } from './port';

const logger = createLogger('kubernetes');

export type NodeApi = Pick<k8s.CoreV1Api, 'listNode'>;
export type DaemonSetApi = Pick<
  k8s.AppsV1Api,
  'createNamespacedDaemonSet' | 'readNamespacedDaemonSetStatus' | 'deleteNamespacedDaemonSet'
>;

export interface PodOwner {
  name: string;
  uid: string;
}

export interface KubernetesClusterOptions {
  namespace: string;
  /** How long the pull container blocks before exiting */
  pullSleepSeconds: number;
  /** Pod running the prewarmer; pull jobs are garbage collected with it */
  owner?: PodOwner;
}

export const PULL_CONTAINER_NAME = 'prewarm';
export const PULL_LABEL = 'prewarm';

export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function toClusterNode(node: k8s.V1Node): ClusterNode {
  return {
    name: node.metadata?.name ?? '',
    labels: { ...(node.metadata?.labels ?? {}) },
    unschedulable: node.spec?.unschedulable ?? false,
    taints: (node.spec?.taints ?? []).map((taint) => ({
      key: taint.key,
      value: taint.value,
      effect: taint.effect,
    })),
    images: (node.status?.images ?? []).map((image) => [...(image.names ?? [])]),
  };
}

/**
 * DaemonSet that pulls one image on every selected node. The container
 * sleeps rather than exiting, since a DaemonSet restarts exited pods.
 */
export function buildPullDaemonSet(spec: PullJobSpec, options: KubernetesClusterOptions): k8s.V1DaemonSet {
  const labels = { app: spec.name, [PULL_LABEL]: 'pull' };

  const metadata: k8s.V1ObjectMeta = { name: spec.name, labels };
  if (options.owner) {
    metadata.ownerReferences = [{
      apiVersion: 'v1',
      kind: 'Pod',
      name: options.owner.name,
      uid: options.owner.uid,
    }];
  }

  return {
    apiVersion: 'apps/v1',
    kind: 'DaemonSet',
    metadata,
    spec: {
      selector: { matchLabels: { app: spec.name } },
      template: {
        metadata: { labels },
        spec: {
          automountServiceAccountToken: false,
          nodeSelector: { ...spec.labels },
          imagePullSecrets: spec.pullSecretName ? [{ name: spec.pullSecretName }] : [],
          securityContext: {
            runAsNonRoot: true,
            runAsUser: 1000,
            runAsGroup: 1000,
          },
          containers: [{
            name: PULL_CONTAINER_NAME,
            image: spec.imageURL,
            imagePullPolicy: 'Always',
            command: ['/bin/sh', '-c', `sleep ${options.pullSleepSeconds}`],
            securityContext: {
              allowPrivilegeEscalation: false,
              capabilities: { drop: ['ALL'] },
              readOnlyRootFilesystem: true,
            },
          }],
        },
      },
    },
  };
}

export class KubernetesCluster implements ClusterPort {
  constructor(
    private readonly nodes: NodeApi,
    private readonly daemonSets: DaemonSetApi,
    private readonly options: KubernetesClusterOptions,
  ) {}

  /**
   * Client for the cluster described by the default kubeconfig (in-cluster
   * service account when running in a pod).
   */
  static fromDefaultConfig(options: KubernetesClusterOptions): KubernetesCluster {
    const kc = new k8s.KubeConfig();
    kc.loadFromDefault();
    return new KubernetesCluster(kc.makeApiClient(k8s.CoreV1Api), kc.makeApiClient(k8s.AppsV1Api), options);
  }

  async listNodes(): Promise<ClusterNode[]> {
    try {
      const { body } = await this.nodes.listNode();
      return body.items.map(toClusterNode);
    } catch (error) {
      throw new ClusterError(`Failed to list nodes: ${errorMessage(error)}`, statusCodeOf(error), { cause: error });
    }
  }

  async createPullJob(spec: PullJobSpec): Promise<PullJobHandle> {
    const daemonSet = buildPullDaemonSet(spec, this.options);
    try {
      await this.daemonSets.createNamespacedDaemonSet(this.options.namespace, daemonSet);
      logger.info('Created pull job %s for %s', spec.name, spec.imageURL);
      return { name: spec.name, imageURL: spec.imageURL };
    } catch (error) {
      if (statusCodeOf(error) !== 409) {
        throw new ClusterError(`Failed to create pull job ${spec.name}: ${errorMessage(error)}`, statusCodeOf(error), { cause: error });
      }
    }
    return this.adoptPullJob(spec);
  }

  /**
   * Take over a DaemonSet left by an earlier run, reporting the image it
   * was created for.
   */
  private async adoptPullJob(spec: PullJobSpec): Promise<PullJobHandle> {
    let existing: k8s.V1DaemonSet;
    try {
      ({ body: existing } = await this.daemonSets.readNamespacedDaemonSetStatus(spec.name, this.options.namespace));
    } catch (error) {
      logger.warn('Adopting pull job %s without reading it: %s', spec.name, errorMessage(error));
      return { name: spec.name };
    }

    const containers = existing.spec?.template.spec?.containers ?? [];
    const image = (containers.find((c) => c.name === PULL_CONTAINER_NAME) ?? containers[0])?.image;
    if (image && image !== spec.imageURL) {
      logger.warn('Pull job %s already exists for %s; adopting it instead of pulling %s', spec.name, image, spec.imageURL);
    } else {
      logger.warn('Pull job %s already exists; adopting it', spec.name);
    }
    return image ? { name: spec.name, imageURL: image } : { name: spec.name };
  }

  async getPullJobStatus(handle: PullJobHandle): Promise<PullJobStatus> {
    let daemonSet: k8s.V1DaemonSet;
    try {
      ({ body: daemonSet } = await this.daemonSets.readNamespacedDaemonSetStatus(handle.name, this.options.namespace));
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        throw new PullJobNotFoundError(handle.name);
      }
      throw new ClusterError(`Failed to read pull job ${handle.name}: ${errorMessage(error)}`, statusCodeOf(error), { cause: error });
    }

    const desired = daemonSet.status?.desiredNumberScheduled ?? 0;
    const ready = daemonSet.status?.numberAvailable ?? 0;
    logger.debug('Pull job %s: %d of %d available', handle.name, ready, desired);
    return { finished: desired === ready, desired, ready };
  }

  async deletePullJob(handle: PullJobHandle): Promise<void> {
    try {
      await this.daemonSets.deleteNamespacedDaemonSet(handle.name, this.options.namespace);
      logger.info('Deleted pull job %s', handle.name);
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        logger.info('Pull job %s was already gone', handle.name);
        return;
      }
      throw new ClusterError(`Failed to delete pull job ${handle.name}: ${errorMessage(error)}`, statusCodeOf(error), { cause: error });
    }
  }
}
