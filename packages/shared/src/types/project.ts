export type ProjectStatus = 'running' | 'stopped' | 'error' | 'unknown';

export interface HttpGitAuth {
  type: 'http';
  username: string;
  password: string;
}

export interface SshGitAuth {
  type: 'ssh';
  privateKey: string;
  /** SSH login user, `git` for most hosts. */
  user: string;
}

/**
 * Credentials for a private repository. Public repositories carry `null`.
 */
export type GitAuth = HttpGitAuth | SshGitAuth;

export type GitAuthType = GitAuth['type'];

export interface Project {
  id: string;
  name: string;
  gitUrl: string;
  gitBranch: string;
  gitAuth: GitAuth | null;
  workingDir: string;
  /** Paths relative to the repository root, in the order compose merges them. */
  composeFiles: string[];
  /** Extra compose document merged after composeFiles. Never written to disk. */
  composeOverride: string | null;
  /** `KEY=VALUE` entries passed to compose as process environment. */
  variables: string[];
  status: ProjectStatus;
  localCommit: string | null;
  remoteCommit: string | null;
  autoDeployEnabled: boolean;
  createdAt: Date;
  updatedAt: Date;
}
