/**
 * Watcher Tests
 *
 * Covers:
 * - Drift detection and exactly one deploy per drifting project
 * - Redeploy of errored projects without a new commit
 * - Registration to redeploy, end to end over the fakes
 * - Retry of transient fetch failures, isolation of per-project errors
 * - Status sync and the polling loop
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { GitError, ProcessError } from '../lib/errors.js';
import { MutexManager } from '../lib/mutexManager.js';
import {
  FakeComposeRunner,
  FakeGitClient,
  InMemoryDeploymentRepository,
  InMemoryProjectRepository,
} from '../testing/fakes.js';
import { DeploymentOrchestrator } from './deploymentOrchestrator.js';
import { ProjectService } from './projectService.js';
import { Watcher, type WatcherOptions } from './watcher.js';

const BLOG_URL = 'https://git.example.test/blog.git';
const SHOP_URL = 'https://git.example.test/shop.git';
const FILES = { 'compose.yaml': 'services:\n  web:\n    image: nginx\n' };

describe('Watcher', () => {
  let root: string;
  let deployments: InMemoryDeploymentRepository;
  let projects: InMemoryProjectRepository;
  let git: FakeGitClient;
  let compose: FakeComposeRunner;
  let orchestrator: DeploymentOrchestrator;
  let service: ProjectService;

  function createWatcher(options: Partial<WatcherOptions> = {}): Watcher {
    return new Watcher(projects, git, orchestrator, {
      pollIntervalMs: 60_000,
      syncStatus: false,
      fetchAttempts: 3,
      retryBaseDelayMs: 1,
      ...options,
    });
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'dockhand-watcher-'));
    deployments = new InMemoryDeploymentRepository();
    projects = new InMemoryProjectRepository(deployments);
    git = new FakeGitClient();
    git.addRemote(BLOG_URL, 'main', 'c1', FILES);
    git.addRemote(SHOP_URL, 'main', 's1', FILES);
    compose = new FakeComposeRunner();
    orchestrator = new DeploymentOrchestrator(projects, deployments, git, compose, new MutexManager());
    service = new ProjectService(projects, deployments, git, compose, {
      workspaceDir: join(root, 'projects'),
      tmpDir: join(root, 'tmp'),
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('leaves projects alone when nothing changed', async () => {
    await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });

    await expect(createWatcher().sweep()).resolves.toEqual({
      checked: 1,
      deployed: 0,
      upToDate: 1,
      failed: 0,
      statusSynced: 0,
    });
    expect(compose.count('up')).toBe(0);
  });

  it('deploys a new remote commit once and then settles', async () => {
    const project = await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    git.push(BLOG_URL, 'main', 'c2');
    const watcher = createWatcher();

    await expect(watcher.sweep()).resolves.toMatchObject({ checked: 1, deployed: 1, upToDate: 0 });

    await expect(projects.findById(project.id)).resolves.toMatchObject({
      status: 'running',
      localCommit: 'c2',
      remoteCommit: 'c2',
    });
    const history = await service.listDeployments(project.id);
    expect(history.map((d) => [d.commitHash, d.status])).toEqual([['c2', 'completed']]);

    await expect(watcher.sweep()).resolves.toMatchObject({ deployed: 0, upToDate: 1 });
    expect(compose.count('up')).toBe(1);
  });

  it('deploys only the projects that drifted', async () => {
    const blog = await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    const shop = await service.register({ name: 'shop', gitUrl: SHOP_URL, composeFiles: ['compose.yaml'] });
    git.push(SHOP_URL, 'main', 's2');

    await expect(createWatcher().sweep()).resolves.toMatchObject({ checked: 2, deployed: 1, upToDate: 1 });
    expect(compose.count('up', shop.id)).toBe(1);
    expect(compose.count('up', blog.id)).toBe(0);
  });

  it('redeploys an errored project at the same commit', async () => {
    const project = await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    await orchestrator.setProjectStatus(project.id, 'error');
    const watcher = createWatcher();

    await expect(watcher.sweep()).resolves.toMatchObject({ checked: 1, deployed: 1, upToDate: 0 });
    expect(compose.count('up', project.id)).toBe(1);
    await expect(projects.findById(project.id)).resolves.toMatchObject({ status: 'running', localCommit: 'c1' });

    await expect(watcher.sweep()).resolves.toMatchObject({ deployed: 0, upToDate: 1 });
    expect(compose.count('up', project.id)).toBe(1);
  });

  it('redeploys once when compose reports the project failed', async () => {
    const project = await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    git.push(BLOG_URL, 'main', 'c2');
    compose.statuses.set(project.id, { status: 'failed', containers: [], uptime: '' });

    await expect(createWatcher({ syncStatus: true }).sweep()).resolves.toMatchObject({
      statusSynced: 1,
      deployed: 1,
    });
    expect(compose.count('up', project.id)).toBe(1);
    await expect(projects.findById(project.id)).resolves.toMatchObject({ status: 'running', localCommit: 'c2' });
  });

  it('does not redeploy a project a manual deploy already updated', async () => {
    const project = await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    git.push(BLOG_URL, 'main', 'c2');
    const snapshot = await projects.list();
    await orchestrator.deploy(project.id, { pull: true });
    vi.spyOn(projects, 'list').mockResolvedValueOnce(snapshot);

    await expect(createWatcher().sweep()).resolves.toMatchObject({ checked: 1, deployed: 0, upToDate: 1 });
    expect(compose.count('up', project.id)).toBe(1);
    await expect(service.listDeployments(project.id)).resolves.toHaveLength(1);
  });

  it('skips projects with auto-deploy disabled', async () => {
    const project = await service.register({
      name: 'blog',
      gitUrl: BLOG_URL,
      composeFiles: ['compose.yaml'],
      autoDeployEnabled: false,
    });
    git.push(BLOG_URL, 'main', 'c2');

    await expect(createWatcher().sweep()).resolves.toMatchObject({ checked: 0, deployed: 0 });
    await expect(projects.findById(project.id)).resolves.toMatchObject({ remoteCommit: 'c1' });
  });

  it('retries transient fetch failures', async () => {
    await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    git.failNext(
      'fetch',
      new GitError('git fetch failed: Connection timed out', 'network'),
      new GitError('git fetch failed: Connection timed out', 'network')
    );

    await expect(createWatcher().sweep()).resolves.toMatchObject({ upToDate: 1, failed: 0 });
    expect(git.count('fetch')).toBe(3);
  });

  it('marks a failing project as errored and carries on', async () => {
    const blog = await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    const shop = await service.register({ name: 'shop', gitUrl: SHOP_URL, composeFiles: ['compose.yaml'] });
    git.failNext('fetch', new GitError('git fetch failed: Authentication failed', 'auth'));
    git.push(SHOP_URL, 'main', 's2');

    await expect(createWatcher().sweep()).resolves.toMatchObject({ checked: 2, failed: 1, deployed: 1 });
    expect(git.count('fetch')).toBe(3);
    await expect(projects.findById(blog.id)).resolves.toMatchObject({ status: 'error' });
    await expect(projects.findById(shop.id)).resolves.toMatchObject({ status: 'running', localCommit: 's2' });
  });

  it('records the remote commit even when the deploy fails', async () => {
    const project = await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    git.push(BLOG_URL, 'main', 'c2');
    compose.failNext(
      'up',
      new ProcessError('docker compose up exited with code 1', {
        command: ['docker', 'compose', 'up'],
        exitCode: 1,
        signal: null,
        stdout: '',
        stderr: 'image not found\n',
      })
    );

    await expect(createWatcher().sweep()).resolves.toMatchObject({ deployed: 0, failed: 1 });
    await expect(projects.findById(project.id)).resolves.toMatchObject({
      status: 'error',
      remoteCommit: 'c2',
    });
    const [record] = await service.listDeployments(project.id);
    expect(record?.status).toBe('failed');
    expect(record?.commitHash).toBe('c2');
  });

  it('syncs statuses from compose before checking', async () => {
    const project = await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    compose.statuses.set(project.id, { status: 'running', containers: [], uptime: '1 hour' });

    await expect(createWatcher({ syncStatus: true }).sweep()).resolves.toMatchObject({ statusSynced: 1 });
    await expect(projects.findById(project.id)).resolves.toMatchObject({ status: 'running' });
  });

  it('sweeps repeatedly until aborted', async () => {
    await service.register({ name: 'blog', gitUrl: BLOG_URL, composeFiles: ['compose.yaml'] });
    const watcher = createWatcher({ pollIntervalMs: 5 });
    const controller = new AbortController();

    const loop = watcher.start(controller.signal);
    expect(watcher.isRunning).toBe(true);

    const deadline = Date.now() + 5000;
    while (git.count('fetch') < 2 && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, 5));
    }
    controller.abort();
    await loop;

    expect(git.count('fetch')).toBeGreaterThanOrEqual(2);
    expect(watcher.isRunning).toBe(false);
  });
});
