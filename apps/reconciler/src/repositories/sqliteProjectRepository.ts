import { z } from 'zod';
import type { GitAuth, Project, ProjectStatus } from '@dockhand/shared';
import { runInTransaction, type Db } from '../db/index.js';
import type { CredentialVault } from '../services/credentialVault.js';
import { NotFoundError, ValidationError, toError } from '../lib/errors.js';
import { dbLogger } from '../lib/logger.js';
import type { NewProject, ProjectPatch, ProjectRepository } from './types.js';

interface ProjectRow {
  id: string;
  name: string;
  git_url: string;
  git_branch: string;
  git_auth_type: string | null;
  git_auth_credentials: string | null;
  working_dir: string;
  compose_files: string;
  compose_override: string | null;
  variables: string;
  status: string;
  local_commit: string | null;
  remote_commit: string | null;
  auto_deploy_enabled: number;
  created_at: string;
  updated_at: string;
}

const PROJECT_STATUSES: readonly ProjectStatus[] = ['running', 'stopped', 'error', 'unknown'];
const StringListSchema = z.array(z.string());

function isUniqueNameViolation(err: unknown): boolean {
  return err instanceof Error && err.message.includes('UNIQUE constraint failed: projects.name');
}

/**
 * Projects persisted in SQLite. Git credentials are stored encrypted and
 * decrypted on load; a credential that no longer decrypts loads as `null`.
 */
export class SqliteProjectRepository implements ProjectRepository {
  constructor(
    private readonly db: Db,
    private readonly vault: CredentialVault
  ) {}

  async findById(id: string): Promise<Project | null> {
    const row = this.db.prepare<[string], ProjectRow>('SELECT * FROM projects WHERE id = ?').get(id);
    return row ? this.rowToProject(row) : null;
  }

  async findByName(name: string): Promise<Project | null> {
    const row = this.db.prepare<[string], ProjectRow>('SELECT * FROM projects WHERE name = ?').get(name);
    return row ? this.rowToProject(row) : null;
  }

  async list(): Promise<Project[]> {
    const rows = this.db.prepare<[], ProjectRow>('SELECT * FROM projects ORDER BY name').all();
    return rows.map((row) => this.rowToProject(row));
  }

  async create(project: NewProject): Promise<Project> {
    const now = new Date().toISOString();
    const auth = this.vault.encrypt(project.gitAuth);

    try {
      this.db
        .prepare(
          `INSERT INTO projects (
            id, name, git_url, git_branch, git_auth_type, git_auth_credentials, working_dir,
            compose_files, compose_override, variables, status, local_commit, remote_commit,
            auto_deploy_enabled, created_at, updated_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          project.id,
          project.name,
          project.gitUrl,
          project.gitBranch,
          auth?.authType ?? null,
          auth?.ciphertext ?? null,
          project.workingDir,
          JSON.stringify(project.composeFiles),
          project.composeOverride,
          JSON.stringify(project.variables),
          project.status,
          project.localCommit,
          project.remoteCommit,
          project.autoDeployEnabled ? 1 : 0,
          now,
          now
        );
    } catch (err) {
      if (isUniqueNameViolation(err)) {
        throw new ValidationError(`A project named "${project.name}" already exists`);
      }
      throw err;
    }

    dbLogger.debug({ projectId: project.id, name: project.name }, 'Project created');
    return this.requireProject(project.id);
  }

  async update(id: string, patch: ProjectPatch): Promise<Project> {
    const assignments: string[] = [];
    const values: Array<string | number | null> = [];
    const set = (column: string, value: string | number | null): void => {
      assignments.push(`${column} = ?`);
      values.push(value);
    };

    if (patch.name !== undefined) set('name', patch.name);
    if (patch.gitBranch !== undefined) set('git_branch', patch.gitBranch);
    if (patch.gitAuth !== undefined) {
      const auth = this.vault.encrypt(patch.gitAuth);
      set('git_auth_type', auth?.authType ?? null);
      set('git_auth_credentials', auth?.ciphertext ?? null);
    }
    if (patch.composeFiles !== undefined) set('compose_files', JSON.stringify(patch.composeFiles));
    if (patch.composeOverride !== undefined) set('compose_override', patch.composeOverride);
    if (patch.variables !== undefined) set('variables', JSON.stringify(patch.variables));
    if (patch.status !== undefined) set('status', patch.status);
    if (patch.localCommit !== undefined) set('local_commit', patch.localCommit);
    if (patch.remoteCommit !== undefined) set('remote_commit', patch.remoteCommit);
    if (patch.autoDeployEnabled !== undefined) set('auto_deploy_enabled', patch.autoDeployEnabled ? 1 : 0);
    set('updated_at', new Date().toISOString());

    let changes: number;
    try {
      changes = this.db.prepare(`UPDATE projects SET ${assignments.join(', ')} WHERE id = ?`).run(...values, id).changes;
    } catch (err) {
      if (isUniqueNameViolation(err)) {
        throw new ValidationError(`A project named "${patch.name}" already exists`);
      }
      throw err;
    }

    if (changes === 0) {
      throw new NotFoundError('project', id);
    }
    return this.requireProject(id);
  }

  async delete(id: string): Promise<void> {
    const result = this.db.prepare('DELETE FROM projects WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('project', id);
    }
    dbLogger.debug({ projectId: id }, 'Project deleted');
  }

  /**
   * Re-encrypt every stored credential that only opens with a previous key.
   * Runs in one transaction; returns the number of rewritten rows.
   */
  reencryptCredentials(): number {
    const rows = this.db
      .prepare<[], Pick<ProjectRow, 'id' | 'git_auth_credentials'>>(
        'SELECT id, git_auth_credentials FROM projects WHERE git_auth_credentials IS NOT NULL'
      )
      .all();
    const update = this.db.prepare('UPDATE projects SET git_auth_credentials = ?, updated_at = ? WHERE id = ?');

    const rotated = runInTransaction(this.db, () => {
      let count = 0;
      for (const row of rows) {
        if (row.git_auth_credentials === null) continue;
        try {
          if (!this.vault.needsRotation(row.git_auth_credentials)) continue;
          update.run(this.vault.rotate(row.git_auth_credentials), new Date().toISOString(), row.id);
          count++;
        } catch (err) {
          dbLogger.warn({ projectId: row.id, err }, 'Skipping credentials that no configured key can decrypt');
        }
      }
      return count;
    });

    dbLogger.info({ rotated }, 'Credential re-encryption complete');
    return rotated;
  }

  private requireProject(id: string): Project {
    const row = this.db.prepare<[string], ProjectRow>('SELECT * FROM projects WHERE id = ?').get(id);
    if (!row) {
      throw new NotFoundError('project', id);
    }
    return this.rowToProject(row);
  }

  private decryptAuth(row: ProjectRow): GitAuth | null {
    if (row.git_auth_type === null || row.git_auth_credentials === null) {
      return null;
    }
    try {
      return this.vault.decrypt(row.git_auth_type, row.git_auth_credentials);
    } catch (err) {
      dbLogger.warn(
        { projectId: row.id, authType: row.git_auth_type, err: toError(err).message },
        'Failed to decrypt git credentials; loading project without authentication'
      );
      return null;
    }
  }

  private parseList(row: ProjectRow, column: 'compose_files' | 'variables'): string[] {
    try {
      const result = StringListSchema.safeParse(JSON.parse(row[column]));
      if (result.success) {
        return result.data;
      }
    } catch (err) {
      dbLogger.error({ projectId: row.id, column, err }, 'Failed to parse project JSON column');
      return [];
    }
    dbLogger.error({ projectId: row.id, column }, 'Project JSON column is not a list of strings');
    return [];
  }

  private parseStatus(row: ProjectRow): ProjectStatus {
    const status = PROJECT_STATUSES.find((candidate) => candidate === row.status);
    if (!status) {
      dbLogger.warn({ projectId: row.id, status: row.status }, 'Unknown project status in database');
      return 'unknown';
    }
    return status;
  }

  private rowToProject(row: ProjectRow): Project {
    return {
      id: row.id,
      name: row.name,
      gitUrl: row.git_url,
      gitBranch: row.git_branch,
      gitAuth: this.decryptAuth(row),
      workingDir: row.working_dir,
      composeFiles: this.parseList(row, 'compose_files'),
      composeOverride: row.compose_override,
      variables: this.parseList(row, 'variables'),
      status: this.parseStatus(row),
      localCommit: row.local_commit,
      remoteCommit: row.remote_commit,
      autoDeployEnabled: row.auto_deploy_enabled === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
