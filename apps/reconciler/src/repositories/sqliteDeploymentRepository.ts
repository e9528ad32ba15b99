import { v4 as uuidv4 } from 'uuid';
import type { Deployment } from '@dockhand/shared';
import type { Db } from '../db/index.js';
import { NotFoundError } from '../lib/errors.js';
import { assertMutable, assertTransition, parseDeploymentStatus } from '../services/deploymentLifecycle.js';
import type { DeploymentPatch, DeploymentRepository, NewDeployment } from './types.js';

interface DeploymentRow {
  id: string;
  project_id: string;
  commit_hash: string;
  status: string;
  stdout: string;
  stderr: string;
  created_at: string;
  updated_at: string;
}

export class SqliteDeploymentRepository implements DeploymentRepository {
  constructor(private readonly db: Db) {}

  async create(deployment: NewDeployment): Promise<Deployment> {
    const id = uuidv4();
    const now = new Date().toISOString();

    this.db
      .prepare(
        `INSERT INTO deployments (id, project_id, commit_hash, status, stdout, stderr, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        deployment.projectId,
        deployment.commitHash,
        deployment.status ?? 'in_progress',
        deployment.stdout ?? '',
        deployment.stderr ?? '',
        now,
        now
      );

    return this.require(id);
  }

  async update(id: string, patch: DeploymentPatch): Promise<Deployment> {
    const current = this.require(id);
    assertMutable(id, current.status);
    if (patch.status !== undefined) {
      assertTransition(id, current.status, patch.status);
    }

    this.db
      .prepare('UPDATE deployments SET status = ?, stdout = ?, stderr = ?, updated_at = ? WHERE id = ?')
      .run(
        patch.status ?? current.status,
        patch.stdout ?? current.stdout,
        patch.stderr ?? current.stderr,
        new Date().toISOString(),
        id
      );

    return this.require(id);
  }

  async findById(id: string): Promise<Deployment | null> {
    const row = this.db.prepare<[string], DeploymentRow>('SELECT * FROM deployments WHERE id = ?').get(id);
    return row ? this.rowToDeployment(row) : null;
  }

  async listByProjectId(projectId: string): Promise<Deployment[]> {
    const rows = this.db
      .prepare<[string], DeploymentRow>(
        'SELECT * FROM deployments WHERE project_id = ? ORDER BY created_at DESC, rowid DESC'
      )
      .all(projectId);
    return rows.map((row) => this.rowToDeployment(row));
  }

  private require(id: string): Deployment {
    const row = this.db.prepare<[string], DeploymentRow>('SELECT * FROM deployments WHERE id = ?').get(id);
    if (!row) {
      throw new NotFoundError('deployment', id);
    }
    return this.rowToDeployment(row);
  }

  private rowToDeployment(row: DeploymentRow): Deployment {
    return {
      id: row.id,
      projectId: row.project_id,
      commitHash: row.commit_hash,
      status: parseDeploymentStatus(row.status),
      stdout: row.stdout,
      stderr: row.stderr,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
