import { rename, rm } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { Deployment, Project, ProjectStatus, StreamMessageType } from '@dockhand/shared';
import { NotFoundError, ProcessError, formatErrorForUser, toError } from '../lib/errors.js';
import { orchestratorLogger } from '../lib/logger.js';
import type { MutexManager } from '../lib/mutexManager.js';
import type { DeploymentRepository, ProjectRepository } from '../repositories/types.js';
import { projectGitDir, type ComposeRunner } from './compose/composeExecutor.js';
import { BLOCKING, type ExecutionMode, type ProcessResult } from './compose/processRunner.js';
import type { GitClient } from './git/gitSynchronizer.js';

export interface DeployOptions {
  /** Pull the tracked branch before bringing the project up. */
  pull?: boolean;
  mode?: ExecutionMode;
  signal?: AbortSignal;
}

export interface StopOptions {
  removeVolumes?: boolean;
  mode?: ExecutionMode;
  signal?: AbortSignal;
}

export interface RemoveOptions {
  removeVolumes?: boolean;
  signal?: AbortSignal;
}

export interface ProjectLogsOptions {
  follow?: boolean;
  mode?: ExecutionMode;
  signal?: AbortSignal;
}

type Notify = (type: StreamMessageType, content: string) => void;

const UNKNOWN_COMMIT = 'unknown';

function shortHash(hash: string): string {
  return hash.slice(0, 8);
}

function appendError(stderr: string, message: string): string {
  if (stderr === '') return `ERROR: ${message}`;
  return `${stderr.endsWith('\n') ? stderr : `${stderr}\n`}ERROR: ${message}`;
}

export type RedeployReason = 'changed' | 'unhealthy';

/**
 * Why a project should be redeployed to `remoteCommit`, or null when its
 * checkout matches and it is running or deliberately stopped.
 */
export function redeployReason(project: Project, remoteCommit: string): RedeployReason | null {
  if (project.localCommit !== remoteCommit) return 'changed';
  if (project.status !== 'running' && project.status !== 'stopped') return 'unhealthy';
  return null;
}

/** `<parent>/deleted-<name>`, where a working dir goes when it cannot be removed. */
export function deletedDirectoryPath(workingDir: string): string {
  return join(dirname(workingDir), `deleted-${basename(workingDir)}`);
}

/**
 * Deploy, stop and remove projects. Every mutation holds the project's lock,
 * so operations on one project never interleave.
 *
 * In streaming mode the caller's channel also receives progress notes and
 * is closed when the operation ends.
 */
export class DeploymentOrchestrator {
  constructor(
    private readonly projects: ProjectRepository,
    private readonly deployments: DeploymentRepository,
    private readonly git: GitClient,
    private readonly compose: ComposeRunner,
    private readonly locks: MutexManager
  ) {}

  /**
   * Bring a project up at its current (or freshly pulled) commit and record
   * the attempt. Failures are recorded and rethrown.
   */
  async deploy(projectId: string, options: DeployOptions = {}): Promise<Deployment> {
    const mode = options.mode ?? BLOCKING;
    return this.streamed(mode, (notify) =>
      this.locks.withProjectLock(projectId, () => this.runDeploy(projectId, { ...options, mode }, notify))
    );
  }

  /**
   * Pull and deploy only if the project still needs it once its lock is
   * held. Resolves to null when a deploy that finished meanwhile already
   * brought it to `remoteCommit`.
   */
  async deployIfNeeded(projectId: string, remoteCommit: string, options: DeployOptions = {}): Promise<Deployment | null> {
    const mode = options.mode ?? BLOCKING;
    return this.streamed(mode, (notify) =>
      this.locks.withProjectLock(projectId, async () => {
        const project = await this.requireProject(projectId);
        const reason = redeployReason(project, remoteCommit);
        if (reason === null) {
          orchestratorLogger.debug({ projectId, commit: remoteCommit }, 'Project already up to date');
          return null;
        }
        orchestratorLogger.info(
          { projectId, reason, from: project.localCommit, to: remoteCommit, status: project.status },
          'Redeploying project'
        );
        return this.runDeploy(projectId, { ...options, pull: true, mode }, notify);
      })
    );
  }

  async stop(projectId: string, options: StopOptions = {}): Promise<Project> {
    const mode = options.mode ?? BLOCKING;
    return this.streamed(mode, (notify) =>
      this.locks.withProjectLock(projectId, async () => {
        const project = await this.requireProject(projectId);
        return this.runStop(project, { ...options, mode }, notify);
      })
    );
  }

  /**
   * Stop the project, delete its working directory and forget it. A failed
   * stop leaves everything in place.
   */
  async remove(projectId: string, options: RemoveOptions = {}): Promise<void> {
    await this.locks.withProjectLock(projectId, async () => {
      const project = await this.requireProject(projectId);
      await this.runStop(project, { ...options, mode: BLOCKING }, () => undefined);
      await this.removeWorkingDir(project);
      await this.projects.delete(projectId);
      orchestratorLogger.info({ projectId, name: project.name }, 'Project removed');
    });
    this.locks.cleanupProjectMutex(projectId);
  }

  /** Container logs. Read-only, so no lock is taken. */
  async logs(projectId: string, options: ProjectLogsOptions = {}): Promise<ProcessResult> {
    const mode = options.mode ?? BLOCKING;
    return this.streamed(mode, async () => {
      const project = await this.requireProject(projectId);
      return this.compose.logs(project, { follow: options.follow, mode, signal: options.signal });
    });
  }

  /**
   * Align the stored status with what compose reports.
   */
  async refreshStatus(projectId: string, options: { signal?: AbortSignal } = {}): Promise<ProjectStatus> {
    return this.locks.withProjectLock(projectId, async () => {
      const project = await this.requireProject(projectId);
      let status: ProjectStatus;
      try {
        const composeStatus = await this.compose.status(project, options);
        status = composeStatus.status === 'failed' ? 'error' : composeStatus.status;
      } catch (err) {
        orchestratorLogger.warn({ projectId, err }, 'Could not read compose status');
        status = 'unknown';
      }

      if (status !== project.status) {
        await this.projects.update(projectId, { status });
        orchestratorLogger.info({ projectId, from: project.status, to: status }, 'Project status synced');
      }
      return status;
    });
  }

  async setProjectStatus(projectId: string, status: ProjectStatus): Promise<Project> {
    return this.locks.withProjectLock(projectId, async () => {
      await this.requireProject(projectId);
      return this.projects.update(projectId, { status });
    });
  }

  private async streamed<T>(mode: ExecutionMode, fn: (notify: Notify) => Promise<T>): Promise<T> {
    const channel = mode.kind === 'streaming' ? mode.channel : null;
    const notify: Notify = (type, content) => {
      channel?.trySend({ type, content });
    };
    try {
      return await fn(notify);
    } finally {
      channel?.close();
    }
  }

  private async runDeploy(projectId: string, options: DeployOptions & { mode: ExecutionMode }, notify: Notify): Promise<Deployment> {
    const project = await this.requireProject(projectId);
    const gitDir = projectGitDir(project);
    const { mode, signal } = options;
    const log = orchestratorLogger.child({ projectId, name: project.name });

    let commit = project.localCommit ?? UNKNOWN_COMMIT;
    let deployment: Deployment | null = null;

    try {
      if (options.pull) {
        notify('info', 'Pulling latest changes from Git...');
        const pulled = await this.git.pull(project.gitBranch, project.gitAuth, gitDir, { signal });
        if (pulled.updated) {
          notify(
            'info',
            `Git pull completed successfully (from ${shortHash(pulled.previousCommit)} to ${shortHash(pulled.currentCommit)})`
          );
        } else {
          notify('info', `Already up to date at ${shortHash(pulled.currentCommit)}`);
        }
      }

      commit = await this.git.getLatestCommit(gitDir);
      deployment = await this.deployments.create({ projectId, commitHash: commit });
      log.info({ deploymentId: deployment.id, commit }, 'Deployment started');
      notify('info', 'Starting deployment...');

      const output = await this.compose.up(project, { mode, signal });

      deployment = await this.deployments.update(deployment.id, {
        status: 'completed',
        stdout: output.stdout,
        stderr: output.stderr,
      });
      await this.projects.update(projectId, { status: 'running', localCommit: commit, remoteCommit: commit });

      log.info({ deploymentId: deployment.id, commit }, 'Deployment completed');
      notify('success', `Deployment completed successfully at ${shortHash(commit)}`);
      return deployment;
    } catch (err) {
      const error = toError(err);
      log.error({ err: error, deploymentId: deployment?.id, commit }, 'Deployment failed');
      await this.recordFailure(projectId, commit, deployment, error);
      notify('error', `Deployment failed: ${formatErrorForUser(error)}`);
      throw err;
    }
  }

  /**
   * Every attempt leaves a failed record, including those that never got
   * as far as creating one.
   */
  private async recordFailure(projectId: string, commit: string, deployment: Deployment | null, error: Error): Promise<void> {
    const stdout = error instanceof ProcessError ? error.stdout : '';
    const stderr = appendError(error instanceof ProcessError ? error.stderr : '', error.message);

    try {
      if (deployment === null) {
        await this.deployments.create({ projectId, commitHash: commit, status: 'failed', stdout, stderr });
      } else if (deployment.status === 'in_progress') {
        await this.deployments.update(deployment.id, { status: 'failed', stdout, stderr });
      }
    } catch (recordErr) {
      orchestratorLogger.error({ projectId, deploymentId: deployment?.id, err: recordErr }, 'Failed to record deployment failure');
    }
  }

  private async runStop(
    project: Project,
    options: StopOptions & { mode: ExecutionMode },
    notify: Notify
  ): Promise<Project> {
    notify('info', 'Stopping project...');
    try {
      await this.compose.down(project, {
        removeVolumes: options.removeVolumes,
        mode: options.mode,
        signal: options.signal,
      });
    } catch (err) {
      orchestratorLogger.error({ projectId: project.id, err }, 'Failed to stop project');
      notify('error', `Stop failed: ${formatErrorForUser(err)}`);
      throw err;
    }

    const stopped = await this.projects.update(project.id, { status: 'stopped' });
    orchestratorLogger.info({ projectId: project.id, removeVolumes: options.removeVolumes ?? false }, 'Project stopped');
    notify('success', 'Project stopped');
    return stopped;
  }

  private async removeWorkingDir(project: Project): Promise<void> {
    try {
      await rm(project.workingDir, { recursive: true, force: true });
    } catch (err) {
      const target = deletedDirectoryPath(project.workingDir);
      orchestratorLogger.warn(
        { projectId: project.id, workingDir: project.workingDir, target, err },
        'Could not delete working directory, moving it aside'
      );
      await rename(project.workingDir, target);
    }
  }

  private async requireProject(projectId: string): Promise<Project> {
    const project = await this.projects.findById(projectId);
    if (!project) {
      throw new NotFoundError('project', projectId);
    }
    return project;
  }
}
