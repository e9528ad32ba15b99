import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { GitAuth } from '@dockhand/shared';
import { gitLogger } from '../../lib/logger.js';

/**
 * Per-invocation git settings derived from a project's credentials.
 * Nothing here is persisted into the repository's .git/config.
 */
export interface PreparedGitAuth {
  /** `-c key=value` settings for every git command. */
  config: string[];
  /** Variables added to the git child process environment. */
  env: Record<string, string>;
  /** Removes any temporary key material. Safe to call more than once. */
  cleanup(): Promise<void>;
}

const BASE_SSH_COMMAND = 'ssh -o BatchMode=yes';

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function basicAuthHeader(username: string, password: string): string {
  return `Authorization: Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}

export function buildSshCommand(keyPath: string, user: string): string {
  return [
    'ssh',
    '-i',
    shellQuote(keyPath),
    '-o IdentitiesOnly=yes',
    '-o BatchMode=yes',
    '-o StrictHostKeyChecking=accept-new',
    '-l',
    shellQuote(user),
  ].join(' ');
}

/**
 * Translate credentials into git config and environment. SSH keys are
 * written to a fresh 0600 file that `cleanup` removes.
 */
export async function prepareGitAuth(auth: GitAuth | null, tmpRoot: string = tmpdir()): Promise<PreparedGitAuth> {
  const config = ['credential.helper='];
  const env: Record<string, string> = {
    GIT_TERMINAL_PROMPT: '0',
    GIT_SSH_COMMAND: BASE_SSH_COMMAND,
  };
  const noop = async (): Promise<void> => undefined;

  if (!auth) {
    return { config, env, cleanup: noop };
  }

  if (auth.type === 'http') {
    config.push(`http.extraHeader=${basicAuthHeader(auth.username, auth.password)}`);
    return { config, env, cleanup: noop };
  }

  const keyDir = await mkdtemp(join(tmpRoot, 'dockhand-ssh-'));
  const keyPath = join(keyDir, 'id_key');
  const key = auth.privateKey.endsWith('\n') ? auth.privateKey : `${auth.privateKey}\n`;
  await writeFile(keyPath, key, { mode: 0o600 });
  env.GIT_SSH_COMMAND = buildSshCommand(keyPath, auth.user || 'git');

  let cleaned = false;
  return {
    config,
    env,
    cleanup: async () => {
      if (cleaned) return;
      cleaned = true;
      try {
        await rm(keyDir, { recursive: true, force: true });
      } catch (err) {
        gitLogger.warn({ err, keyDir }, 'Failed to remove temporary SSH key');
      }
    },
  };
}

/**
 * Run `fn` with prepared credentials and always clean up afterwards.
 */
export async function withGitAuth<T>(
  auth: GitAuth | null,
  fn: (prepared: PreparedGitAuth) => Promise<T>,
  tmpRoot?: string
): Promise<T> {
  const prepared = await prepareGitAuth(auth, tmpRoot);
  try {
    return await fn(prepared);
  } finally {
    await prepared.cleanup();
  }
}
