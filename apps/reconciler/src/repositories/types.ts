import type { Deployment, DeploymentStatus, GitAuth, Project, ProjectStatus } from '@dockhand/shared';

export interface NewProject {
  id: string;
  name: string;
  gitUrl: string;
  gitBranch: string;
  gitAuth: GitAuth | null;
  workingDir: string;
  composeFiles: string[];
  composeOverride: string | null;
  variables: string[];
  status: ProjectStatus;
  localCommit: string | null;
  remoteCommit: string | null;
  autoDeployEnabled: boolean;
}

export type ProjectPatch = Partial<Omit<NewProject, 'id' | 'gitUrl' | 'workingDir'>>;

export interface ProjectRepository {
  findById(id: string): Promise<Project | null>;
  findByName(name: string): Promise<Project | null>;
  /** @throws ValidationError when the name is taken */
  create(project: NewProject): Promise<Project>;
  /** @throws NotFoundError */
  update(id: string, patch: ProjectPatch): Promise<Project>;
  /** Deletes the project and, with it, its deployment history. */
  delete(id: string): Promise<void>;
  list(): Promise<Project[]>;
}

export interface NewDeployment {
  projectId: string;
  commitHash: string;
  status?: DeploymentStatus;
  stdout?: string;
  stderr?: string;
}

export interface DeploymentPatch {
  status?: DeploymentStatus;
  stdout?: string;
  stderr?: string;
}

export interface DeploymentRepository {
  create(deployment: NewDeployment): Promise<Deployment>;
  /** @throws NotFoundError, or ValidationError once the deployment is terminal */
  update(id: string, patch: DeploymentPatch): Promise<Deployment>;
  findById(id: string): Promise<Deployment | null>;
  /** Newest first. */
  listByProjectId(projectId: string): Promise<Deployment[]>;
}
