/**
 * Cluster port - the node and pull job operations the controllers need
 */

import { ClusterNode, PullJobHandle, PullJobSpec, PullJobStatus } from '../types';

export interface ClusterPort {
  listNodes(): Promise<ClusterNode[]>;

  /**
   * Start pulling `spec.imageURL` on every node matching `spec.labels`.
   * A job of the same name that already exists is adopted.
   */
  createPullJob(spec: PullJobSpec): Promise<PullJobHandle>;

  /**
   * Throws PullJobNotFoundError when the job no longer exists.
   */
  getPullJobStatus(handle: PullJobHandle): Promise<PullJobStatus>;

  deletePullJob(handle: PullJobHandle): Promise<void>;
}
