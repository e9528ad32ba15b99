import { simpleGit } from 'simple-git';
import { rm } from 'fs/promises';
import type { GitAuth } from '@dockhand/shared';
import { isValidBranchName, isValidGitUrl } from '@dockhand/shared';
import { CancellationError, GitError, ValidationError, toError, type GitErrorKind } from '../../lib/errors.js';
import { gitLogger } from '../../lib/logger.js';
import { withGitAuth, type PreparedGitAuth } from './gitAuth.js';

export interface PullResult {
  previousCommit: string;
  currentCommit: string;
  /** False when the checkout already matched the remote. */
  updated: boolean;
}

export interface GitOperationOptions {
  signal?: AbortSignal;
}

/**
 * Git capability used by the orchestrator and the watcher.
 */
export interface GitClient {
  /** Returns the branch actually cloned, resolving the default when `branch` is empty. */
  clone(url: string, branch: string, auth: GitAuth | null, destDir: string, options?: GitOperationOptions): Promise<string>;
  pull(branch: string, auth: GitAuth | null, dir: string, options?: GitOperationOptions): Promise<PullResult>;
  fetch(branch: string, auth: GitAuth | null, dir: string, options?: GitOperationOptions): Promise<void>;
  getLatestCommit(dir: string): Promise<string>;
  /** Hash of the remote-tracking ref; requires a prior fetch. */
  getRemoteLatestCommit(dir: string, branch: string): Promise<string>;
  getDefaultBranch(url: string, auth: GitAuth | null, options?: GitOperationOptions): Promise<string>;
  testAuthentication(url: string, auth: GitAuth | null, options?: GitOperationOptions): Promise<void>;
}

/**
 * The subset of simple-git the synchronizer drives.
 */
export interface GitCommands {
  clone(repo: string, dir: string, options: string[]): Promise<unknown>;
  fetch(remote: string, refspec: string): Promise<unknown>;
  revparse(args: string[]): Promise<string>;
  reset(args: string[]): Promise<unknown>;
  listRemote(args: string[]): Promise<string>;
}

export interface GitCommandContext {
  baseDir?: string;
  auth: PreparedGitAuth;
  timeoutMs: number;
  signal?: AbortSignal;
}

export type GitCommandFactory = (context: GitCommandContext) => GitCommands;

export interface GitSynchronizerOptions {
  timeoutMs: number;
  /** Where temporary SSH keys are written. */
  tmpDir?: string;
  createCommands?: GitCommandFactory;
}

/** Host variables git runs with. Editor and GIT_* variables are not inherited. */
const INHERITED_ENV = [
  'PATH',
  'HOME',
  'USER',
  'LANG',
  'LC_ALL',
  'TMPDIR',
  'SSH_AUTH_SOCK',
  'HTTP_PROXY',
  'HTTPS_PROXY',
  'NO_PROXY',
  'http_proxy',
  'https_proxy',
  'no_proxy',
] as const;

export function gitProcessEnv(
  authEnv: Record<string, string>,
  hostEnv: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const name of INHERITED_ENV) {
    const value = hostEnv[name];
    if (value !== undefined) env[name] = value;
  }
  return { ...env, ...authEnv };
}

export const createSimpleGitCommands: GitCommandFactory = ({ baseDir, auth, timeoutMs, signal }) =>
  simpleGit({
    baseDir,
    config: auth.config,
    timeout: { block: timeoutMs },
    abort: signal,
    // credential.helper and GIT_SSH_COMMAND only ever come from prepareGitAuth
    unsafe: { allowUnsafeCredentialHelper: true, allowUnsafeSshCommand: true },
  }).env(gitProcessEnv(auth.env));

const CLASSIFICATION: Array<{ kind: GitErrorKind; patterns: string[] }> = [
  {
    kind: 'auth',
    patterns: [
      'authentication failed',
      'terminal prompts disabled',
      'could not read username',
      'could not read password',
      'permission denied (publickey',
      'host key verification failed',
      'invalid username or password',
      'http basic: access denied',
      'returned error: 401',
      'returned error: 403',
    ],
  },
  {
    kind: 'repository',
    patterns: ['repository not found', 'not a git repository', 'does not appear to be a git repository', 'does not exist'],
  },
  {
    kind: 'ref',
    patterns: ["couldn't find remote ref", 'unknown revision', 'remote branch', 'not found in upstream', 'ambiguous argument'],
  },
  {
    kind: 'network',
    patterns: [
      'could not resolve host',
      'connection refused',
      'connection reset',
      'connection timed out',
      'operation timed out',
      'timed out',
      'block timeout reached',
      'early eof',
      'unable to access',
      'network is unreachable',
      'could not connect',
      'the remote end hung up unexpectedly',
    ],
  },
];

/**
 * Sort a failed git invocation into an error kind from its stderr.
 */
export function classifyGitError(err: unknown): GitErrorKind {
  const message = toError(err).message.toLowerCase();
  for (const { kind, patterns } of CLASSIFICATION) {
    if (patterns.some((pattern) => message.includes(pattern))) {
      return kind;
    }
  }
  return 'unknown';
}

const SYMREF_HEAD_PATTERN = /^ref:\s+refs\/heads\/(\S+)\s+HEAD$/;

/**
 * Pick the default branch out of `git ls-remote --symref` output: the
 * symbolic HEAD line when present, otherwise a branch sharing HEAD's hash.
 */
export function parseDefaultBranch(output: string): string | null {
  const lines = output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  for (const line of lines) {
    const match = SYMREF_HEAD_PATTERN.exec(line);
    if (match) {
      return match[1];
    }
  }

  const refs = lines
    .map((line) => line.split(/\s+/))
    .filter((parts) => parts.length === 2 && !parts[0].startsWith('ref:'));
  const head = refs.find(([, ref]) => ref === 'HEAD');
  if (!head) {
    return null;
  }
  const branch = refs.find(([hash, ref]) => hash === head[0] && ref.startsWith('refs/heads/'));
  return branch ? branch[1].slice('refs/heads/'.length) : null;
}

function assertBranch(branch: string): void {
  if (!isValidBranchName(branch)) {
    throw new ValidationError(`Invalid branch name: "${branch}"`);
  }
}

function assertUrl(url: string): void {
  if (!isValidGitUrl(url)) {
    throw new ValidationError(`Invalid git URL: "${url}"`);
  }
}

function remoteRef(branch: string): string {
  return `refs/remotes/origin/${branch}`;
}

/**
 * Git operations over the `git` CLI through simple-git. Each call gets its
 * own credentials, timeout and abort signal.
 */
export class GitSynchronizer implements GitClient {
  private readonly timeoutMs: number;
  private readonly tmpDir: string | undefined;
  private readonly createCommands: GitCommandFactory;

  constructor(options: GitSynchronizerOptions) {
    this.timeoutMs = options.timeoutMs;
    this.tmpDir = options.tmpDir;
    this.createCommands = options.createCommands ?? createSimpleGitCommands;
  }

  private async run<T>(
    operation: string,
    auth: GitAuth | null,
    baseDir: string | undefined,
    options: GitOperationOptions,
    fn: (git: GitCommands) => Promise<T>
  ): Promise<T> {
    if (options.signal?.aborted) {
      throw new CancellationError(`git ${operation} cancelled`);
    }

    try {
      return await withGitAuth(
        auth,
        (prepared) =>
          fn(this.createCommands({ baseDir, auth: prepared, timeoutMs: this.timeoutMs, signal: options.signal })),
        this.tmpDir
      );
    } catch (err) {
      if (options.signal?.aborted) {
        throw new CancellationError(`git ${operation} cancelled`);
      }
      if (err instanceof GitError || err instanceof ValidationError || err instanceof CancellationError) {
        throw err;
      }
      const kind = classifyGitError(err);
      gitLogger.warn({ operation, kind, dir: baseDir, err: toError(err).message }, 'Git operation failed');
      throw new GitError(`git ${operation} failed: ${toError(err).message.trim()}`, kind, { cause: err });
    }
  }

  async clone(
    url: string,
    branch: string,
    auth: GitAuth | null,
    destDir: string,
    options: GitOperationOptions = {}
  ): Promise<string> {
    assertUrl(url);
    const target = branch === '' ? await this.getDefaultBranch(url, auth, options) : branch;
    assertBranch(target);

    gitLogger.info({ url, branch: target, destDir }, 'Cloning repository');
    try {
      await this.run('clone', auth, undefined, options, (git) =>
        git.clone(url, destDir, ['--single-branch', '--branch', target])
      );
    } catch (err) {
      // A half-written checkout would make the next clone fail
      await rm(destDir, { recursive: true, force: true });
      throw err;
    }
    return target;
  }

  async fetch(branch: string, auth: GitAuth | null, dir: string, options: GitOperationOptions = {}): Promise<void> {
    assertBranch(branch);
    await this.run('fetch', auth, dir, options, (git) =>
      git.fetch('origin', `+refs/heads/${branch}:${remoteRef(branch)}`)
    );
  }

  async pull(branch: string, auth: GitAuth | null, dir: string, options: GitOperationOptions = {}): Promise<PullResult> {
    if (branch === '') {
      throw new ValidationError('Branch is required to pull');
    }
    assertBranch(branch);

    const previousCommit = await this.getLatestCommit(dir);
    await this.fetch(branch, auth, dir, options);
    const remoteCommit = await this.getRemoteLatestCommit(dir, branch);

    if (remoteCommit === previousCommit) {
      gitLogger.debug({ dir, branch, commit: previousCommit }, 'Already up to date');
      return { previousCommit, currentCommit: previousCommit, updated: false };
    }

    // Tracked files follow the remote; untracked files (bind-mount data) stay
    await this.run('reset', null, dir, options, (git) => git.reset(['--hard', remoteRef(branch)]));
    const currentCommit = await this.getLatestCommit(dir);

    gitLogger.info({ dir, branch, from: previousCommit, to: currentCommit }, 'Checkout updated');
    return { previousCommit, currentCommit, updated: currentCommit !== previousCommit };
  }

  async getLatestCommit(dir: string): Promise<string> {
    const hash = await this.run('rev-parse', null, dir, {}, (git) => git.revparse(['HEAD']));
    return hash.trim();
  }

  async getRemoteLatestCommit(dir: string, branch: string): Promise<string> {
    assertBranch(branch);
    const hash = await this.run('rev-parse', null, dir, {}, (git) => git.revparse([remoteRef(branch)]));
    return hash.trim();
  }

  async getDefaultBranch(url: string, auth: GitAuth | null, options: GitOperationOptions = {}): Promise<string> {
    assertUrl(url);
    const output = await this.run('ls-remote', auth, undefined, options, (git) => git.listRemote(['--symref', url]));
    const branch = parseDefaultBranch(output);
    if (!branch) {
      throw new GitError(`Could not determine the default branch of ${url}`, 'ref');
    }
    return branch;
  }

  async testAuthentication(url: string, auth: GitAuth | null, options: GitOperationOptions = {}): Promise<void> {
    assertUrl(url);
    await this.run('ls-remote', auth, undefined, options, (git) => git.listRemote(['--heads', url]));
  }
}
