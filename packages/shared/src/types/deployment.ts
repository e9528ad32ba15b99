export type DeploymentStatus = 'in_progress' | 'completed' | 'failed';

export interface Deployment {
  id: string;
  projectId: string;
  commitHash: string;
  status: DeploymentStatus;
  stdout: string;
  stderr: string;
  createdAt: Date;
  updatedAt: Date;
}

export const TERMINAL_DEPLOYMENT_STATUSES: readonly DeploymentStatus[] = ['completed', 'failed'];

export function isTerminalDeploymentStatus(status: DeploymentStatus): boolean {
  return TERMINAL_DEPLOYMENT_STATUSES.includes(status);
}
