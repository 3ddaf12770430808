/**
 * Core types for the prewarmer server
 */

export type Labels = Record<string, string>;

export interface ImageRef {
  imageURL: string;
  digest: string | null;
}

/**
 * An image known to be resident on a node (or on every node of a target).
 * `tags` are the other tags the same digest is known by.
 */
export interface CachedImage {
  readonly imageURL: string;
  readonly digest: string;
  readonly tags: readonly string[];
}

export interface DesiredImage {
  imageURL: string;
  /** null means any digest for the URL is acceptable */
  digest: string | null;
  displayName: string;
}

export interface DesiredImages {
  priority: DesiredImage[];
  all: DesiredImage[];
}

export interface NodeTaint {
  key: string;
  value?: string;
  effect: string;
}

export interface ClusterNode {
  name: string;
  labels: Labels;
  unschedulable: boolean;
  taints: NodeTaint[];
  /** Each inner list holds every name one pulled image is known by */
  images: string[][];
}

export interface PullJobSpec {
  name: string;
  imageURL: string;
  labels: Labels;
  pullSecretName?: string;
}

export interface PullJobHandle {
  readonly name: string;
  /** Image the job actually pulls, when the cluster reports it */
  readonly imageURL?: string;
}

export interface PullJobStatus {
  finished: boolean;
  desired: number;
  ready: number;
}

export interface TargetSnapshot {
  name: string;
  labels: Labels;
  commonCache: CachedImage[];
  available: DesiredImage[];
  desired: DesiredImage[];
  missing: DesiredImage[];
  all: DesiredImage[];
  pulling: string | null;
  lastCheckedAt: string | null;
  lastError: string | null;
}

export interface ImagesResponse {
  images: DesiredImage[];
  all: DesiredImage[];
}

export interface ErrorResponse {
  code: number;
  message: string;
  details?: string;
}

/**
 * Same content when both digests are known, same URL otherwise.
 */
export function sameImage(a: ImageRef, b: ImageRef): boolean {
  if (a.digest !== null && b.digest !== null) {
    return a.digest === b.digest;
  }
  return a.imageURL === b.imageURL;
}
