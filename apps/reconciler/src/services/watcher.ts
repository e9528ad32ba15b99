import { setTimeout as sleep } from 'timers/promises';
import type { Project } from '@dockhand/shared';
import { GitError, isAbortError } from '../lib/errors.js';
import { watcherLogger } from '../lib/logger.js';
import { withRetry } from '../lib/retry.js';
import type { ProjectRepository } from '../repositories/types.js';
import { projectGitDir } from './compose/composeExecutor.js';
import { BLOCKING } from './compose/processRunner.js';
import type { DeploymentOrchestrator } from './deploymentOrchestrator.js';
import type { GitClient } from './git/gitSynchronizer.js';

export interface WatcherOptions {
  pollIntervalMs: number;
  /** Refresh every project's status from compose before checking for drift. */
  syncStatus: boolean;
  fetchAttempts: number;
  retryBaseDelayMs?: number;
}

export interface SweepReport {
  checked: number;
  deployed: number;
  upToDate: number;
  failed: number;
  statusSynced: number;
}

/**
 * Polls the remote of every auto-deploy project and redeploys when the
 * remote branch has moved past the deployed commit, or when the project is
 * neither running nor stopped.
 */
export class Watcher {
  private running = false;

  constructor(
    private readonly projects: ProjectRepository,
    private readonly git: GitClient,
    private readonly orchestrator: DeploymentOrchestrator,
    private readonly options: WatcherOptions
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Sweep now, then once per poll interval until the signal aborts.
   * Sweeps never overlap.
   */
  async start(signal: AbortSignal): Promise<void> {
    if (this.running) {
      watcherLogger.warn('Watcher already running');
      return;
    }

    this.running = true;
    watcherLogger.info(
      { pollIntervalMs: this.options.pollIntervalMs, syncStatus: this.options.syncStatus },
      'Starting watcher'
    );

    try {
      while (!signal.aborted) {
        try {
          const report = await this.sweep(signal);
          watcherLogger.info({ ...report }, 'Sweep finished');
        } catch (err) {
          if (signal.aborted && isAbortError(err)) break;
          watcherLogger.error({ err }, 'Sweep failed');
        }

        try {
          await sleep(this.options.pollIntervalMs, undefined, { signal });
        } catch (err) {
          if (isAbortError(err)) break;
          throw err;
        }
      }
    } finally {
      this.running = false;
      watcherLogger.info('Watcher stopped');
    }
  }

  async sweep(signal?: AbortSignal): Promise<SweepReport> {
    const report: SweepReport = { checked: 0, deployed: 0, upToDate: 0, failed: 0, statusSynced: 0 };
    const projects = await this.projects.list();

    if (this.options.syncStatus) {
      for (const project of projects) {
        try {
          const status = await this.orchestrator.refreshStatus(project.id, { signal });
          if (status !== project.status) report.statusSynced++;
        } catch (err) {
          if (signal?.aborted) throw err;
          watcherLogger.warn({ projectId: project.id, err }, 'Status sync failed');
        }
      }
    }

    for (const project of projects) {
      if (!project.autoDeployEnabled) continue;
      report.checked++;

      try {
        if (await this.reconcile(project, signal)) {
          report.deployed++;
        } else {
          report.upToDate++;
        }
      } catch (err) {
        if (signal?.aborted) throw err;
        report.failed++;
        watcherLogger.error({ projectId: project.id, name: project.name, err }, 'Auto-deploy check failed');
        await this.markError(project);
      }
    }

    return report;
  }

  /** Returns true when the project was redeployed. */
  private async reconcile(project: Project, signal?: AbortSignal): Promise<boolean> {
    const gitDir = projectGitDir(project);

    await withRetry(() => this.git.fetch(project.gitBranch, project.gitAuth, gitDir, { signal }), {
      maxAttempts: this.options.fetchAttempts,
      baseDelayMs: this.options.retryBaseDelayMs,
      shouldRetry: (err) => err instanceof GitError && err.retryable,
      onRetry: (attempt, err, delayMs) => {
        watcherLogger.warn({ projectId: project.id, attempt, delayMs, err }, 'Fetch failed, retrying');
      },
      signal,
    });

    const remote = await this.git.getRemoteLatestCommit(gitDir, project.gitBranch);
    if (remote !== project.remoteCommit) {
      await this.projects.update(project.id, { remoteCommit: remote });
    }

    const deployment = await this.orchestrator.deployIfNeeded(project.id, remote, { mode: BLOCKING, signal });
    return deployment !== null;
  }

  private async markError(project: Project): Promise<void> {
    try {
      await this.orchestrator.setProjectStatus(project.id, 'error');
    } catch (err) {
      watcherLogger.error({ projectId: project.id, err }, 'Failed to mark project as errored');
    }
  }
}
