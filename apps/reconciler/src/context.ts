import { mkdirSync } from 'fs';
import type { StreamMessage } from '@dockhand/shared';
import type { Config } from './config.js';
import { openDatabase, type Db } from './db/index.js';
import { BoundedChannel } from './lib/boundedChannel.js';
import { MutexManager } from './lib/mutexManager.js';
import { SqliteDeploymentRepository } from './repositories/sqliteDeploymentRepository.js';
import { SqliteProjectRepository } from './repositories/sqliteProjectRepository.js';
import { ComposeCommandBuilder } from './services/compose/commandBuilder.js';
import { ComposeExecutor } from './services/compose/composeExecutor.js';
import { parseComposeLogLine } from './services/compose/logParser.js';
import { ChildProcessRunner } from './services/compose/processRunner.js';
import { CredentialVault } from './services/credentialVault.js';
import { DeploymentOrchestrator } from './services/deploymentOrchestrator.js';
import { GitSynchronizer } from './services/git/gitSynchronizer.js';
import { ProjectService } from './services/projectService.js';
import { Watcher } from './services/watcher.js';

export interface AppContext {
  config: Config;
  db: Db;
  vault: CredentialVault;
  projects: SqliteProjectRepository;
  deployments: SqliteDeploymentRepository;
  git: GitSynchronizer;
  processRunner: ChildProcessRunner;
  compose: ComposeExecutor;
  locks: MutexManager;
  projectService: ProjectService;
  orchestrator: DeploymentOrchestrator;
  watcher: Watcher;
  /** A channel for one streaming operation, sized from `compose.streamBufferSize`. */
  createStreamChannel(): BoundedChannel<StreamMessage>;
  /** Terminate running compose processes, wipe keys and close the database. */
  close(): void;
}

/**
 * Build every service once and wire them together.
 */
export function createAppContext(config: Config): AppContext {
  mkdirSync(config.workspaceDir, { recursive: true });
  mkdirSync(config.tmpDir, { recursive: true });

  const db = openDatabase(config.databasePath);
  const vault = CredentialVault.fromDatabase(db, {
    primary: config.encryptionKey,
    previous: config.previousEncryptionKeys,
  });
  const projects = new SqliteProjectRepository(db, vault);
  const deployments = new SqliteDeploymentRepository(db);

  const git = new GitSynchronizer({ timeoutMs: config.git.timeoutMs, tmpDir: config.tmpDir });
  const processRunner = new ChildProcessRunner({
    stopGracePeriodMs: config.compose.stopGracePeriodMs,
    transformStderr: parseComposeLogLine,
  });
  const compose = new ComposeExecutor(processRunner, new ComposeCommandBuilder(config.compose.binary));
  const locks = new MutexManager();

  const projectService = new ProjectService(projects, deployments, git, compose, {
    workspaceDir: config.workspaceDir,
    tmpDir: config.tmpDir,
  });
  const orchestrator = new DeploymentOrchestrator(projects, deployments, git, compose, locks);
  const watcher = new Watcher(projects, git, orchestrator, {
    pollIntervalMs: config.watcher.pollIntervalMs,
    syncStatus: config.watcher.syncStatus,
    fetchAttempts: config.watcher.fetchAttempts,
  });

  return {
    config,
    db,
    vault,
    projects,
    deployments,
    git,
    processRunner,
    compose,
    locks,
    projectService,
    orchestrator,
    watcher,
    createStreamChannel(): BoundedChannel<StreamMessage> {
      return new BoundedChannel<StreamMessage>(config.compose.streamBufferSize);
    },
    close(): void {
      processRunner.terminateAll();
      vault.clearKeys();
      db.close();
    },
  };
}
