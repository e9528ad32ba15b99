/**
 * Deployment record lifecycle. A deployment starts in progress and moves
 * exactly once to a terminal status; terminal records never change again.
 */

import { isTerminalDeploymentStatus, type DeploymentStatus } from '@dockhand/shared';
import { ValidationError } from '../lib/errors.js';

const DEPLOYMENT_STATUSES: readonly DeploymentStatus[] = ['in_progress', 'completed', 'failed'];

const ALLOWED_TRANSITIONS: Record<DeploymentStatus, readonly DeploymentStatus[]> = {
  in_progress: ['in_progress', 'completed', 'failed'],
  completed: [],
  failed: [],
};

export function parseDeploymentStatus(value: string): DeploymentStatus {
  const status = DEPLOYMENT_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new ValidationError(`Unknown deployment status: ${value}`);
  }
  return status;
}

export function canTransition(from: DeploymentStatus, to: DeploymentStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(deploymentId: string, from: DeploymentStatus, to: DeploymentStatus): void {
  if (!canTransition(from, to)) {
    throw new ValidationError(`Deployment ${deploymentId} is ${from} and cannot become ${to}`);
  }
}

/**
 * Terminal deployments accept no further writes at all, not even output.
 */
export function assertMutable(deploymentId: string, status: DeploymentStatus): void {
  if (isTerminalDeploymentStatus(status)) {
    throw new ValidationError(`Deployment ${deploymentId} is ${status} and can no longer be modified`);
  }
}
