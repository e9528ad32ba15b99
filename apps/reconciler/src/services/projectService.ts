import { mkdir, readFile, readdir, rename, rm } from 'fs/promises';
import { join, relative, resolve, sep } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import {
  CreateProjectSchema,
  GitAuthInputSchema,
  UpdateProjectSchema,
  isValidGitUrl,
  type ComposeStatus,
  type CreateProjectInput,
  type Deployment,
  type GitAuth,
  type Project,
  type UpdateProjectInput,
} from '@dockhand/shared';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { projectLogger } from '../lib/logger.js';
import type { DeploymentRepository, ProjectPatch, ProjectRepository } from '../repositories/types.js';
import { projectGitDir, type ComposeRunner } from './compose/composeExecutor.js';
import type { GitClient, GitOperationOptions } from './git/gitSynchronizer.js';

export interface ProjectServiceOptions {
  workspaceDir: string;
  tmpDir: string;
}

/**
 * A repository cloned for inspection. Pass it to `register` to reuse the
 * clone, or to `discardDiscovery` to delete it.
 */
export interface DiscoveryResult {
  path: string;
  branch: string;
  composeFiles: string[];
}

export interface RegisterOptions extends GitOperationOptions {
  fromDiscovery?: DiscoveryResult;
}

const DISCOVERY_PREFIX = 'discovery-';

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(issues[0] ?? 'Invalid input', issues);
  }
  return result.data;
}

/** Lowercase, dash-separated form of a project name for directory names. */
export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug === '' ? 'project' : slug;
}

function hasServicesMapping(document: unknown): boolean {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    return false;
  }
  if (!('services' in document)) {
    return false;
  }
  const { services } = document;
  return typeof services === 'object' && services !== null && !Array.isArray(services);
}

/**
 * Find compose files under a checkout: YAML documents with a `services`
 * mapping. Hidden directories are skipped. Paths are relative and sorted.
 */
export async function discoverComposeFiles(rootDir: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }
      if (!entry.isFile() || !/\.ya?ml$/.test(entry.name)) continue;

      let document: unknown;
      try {
        document = parseYaml(await readFile(fullPath, 'utf-8'));
      } catch (err) {
        projectLogger.debug({ path: fullPath, err }, 'Skipping unparseable YAML file');
        continue;
      }
      if (hasServicesMapping(document)) {
        found.push(relative(rootDir, fullPath).split(sep).join('/'));
      }
    }
  }

  await walk(rootDir);
  return found.sort();
}

/**
 * Project registration and queries. Mutations that touch running containers
 * live in the DeploymentOrchestrator.
 */
export class ProjectService {
  constructor(
    private readonly projects: ProjectRepository,
    private readonly deployments: DeploymentRepository,
    private readonly git: GitClient,
    private readonly compose: ComposeRunner,
    private readonly options: ProjectServiceOptions
  ) {}

  async register(raw: CreateProjectInput, options: RegisterOptions = {}): Promise<Project> {
    const input = parseInput(CreateProjectSchema, raw);
    if (await this.projects.findByName(input.name)) {
      throw new ValidationError(`A project named "${input.name}" already exists`);
    }

    const id = uuidv4();
    const workingDir = join(this.options.workspaceDir, `${id}-${slugify(input.name)}`);
    const gitDir = projectGitDir({ workingDir });
    const { fromDiscovery, signal } = options;

    try {
      await mkdir(workingDir, { recursive: true });

      let branch: string;
      if (fromDiscovery && (input.gitBranch === '' || input.gitBranch === fromDiscovery.branch)) {
        this.assertDiscoveryPath(fromDiscovery.path);
        await rename(fromDiscovery.path, gitDir);
        branch = fromDiscovery.branch;
      } else {
        const requested =
          input.gitBranch !== '' ? input.gitBranch : await this.git.getDefaultBranch(input.gitUrl, input.gitAuth, { signal });
        branch = await this.git.clone(input.gitUrl, requested, input.gitAuth, gitDir, { signal });
      }

      const head = await this.git.getLatestCommit(gitDir);
      const project = await this.projects.create({
        id,
        name: input.name,
        gitUrl: input.gitUrl,
        gitBranch: branch,
        gitAuth: input.gitAuth,
        workingDir,
        composeFiles: input.composeFiles,
        composeOverride: input.composeOverride,
        variables: input.variables,
        status: 'stopped',
        localCommit: head,
        remoteCommit: head,
        autoDeployEnabled: input.autoDeployEnabled,
      });

      projectLogger.info({ projectId: id, name: project.name, branch, commit: head }, 'Project registered');
      return project;
    } catch (err) {
      await rm(workingDir, { recursive: true, force: true }).catch((cleanupErr: unknown) => {
        projectLogger.warn({ workingDir, err: cleanupErr }, 'Failed to remove working directory after failed registration');
      });
      throw err;
    }
  }

  async update(id: string, raw: UpdateProjectInput): Promise<Project> {
    const input = parseInput(UpdateProjectSchema, raw);
    await this.get(id);

    if (input.name !== undefined) {
      const existing = await this.projects.findByName(input.name);
      if (existing && existing.id !== id) {
        throw new ValidationError(`A project named "${input.name}" already exists`);
      }
    }

    const patch: ProjectPatch = {};
    if (input.name !== undefined) patch.name = input.name;
    if (input.gitAuth !== undefined) patch.gitAuth = input.gitAuth;
    if (input.composeFiles !== undefined) patch.composeFiles = input.composeFiles;
    if (input.composeOverride !== undefined) patch.composeOverride = input.composeOverride;
    if (input.variables !== undefined) patch.variables = input.variables;
    if (input.autoDeployEnabled !== undefined) patch.autoDeployEnabled = input.autoDeployEnabled;

    const updated = await this.projects.update(id, patch);
    projectLogger.info({ projectId: id, fields: Object.keys(patch) }, 'Project updated');
    return updated;
  }

  async get(id: string): Promise<Project> {
    const project = await this.projects.findById(id);
    if (!project) {
      throw new NotFoundError('project', id);
    }
    return project;
  }

  list(): Promise<Project[]> {
    return this.projects.list();
  }

  async listDeployments(id: string): Promise<Deployment[]> {
    await this.get(id);
    return this.deployments.listByProjectId(id);
  }

  async getStatus(id: string, options: GitOperationOptions = {}): Promise<ComposeStatus> {
    return this.compose.status(await this.get(id), options);
  }

  /** The merged compose configuration as compose resolves it. */
  async getConfig(id: string, options: GitOperationOptions = {}): Promise<string> {
    return this.compose.config(await this.get(id), options);
  }

  async testAuthentication(gitUrl: string, auth: GitAuth | null, options: GitOperationOptions = {}): Promise<void> {
    const { url, gitAuth } = this.parseRemote(gitUrl, auth);
    await this.git.testAuthentication(url, gitAuth, options);
  }

  /**
   * Clone a repository's default branch into a scratch directory and list
   * its compose files.
   */
  async discover(gitUrl: string, auth: GitAuth | null, options: GitOperationOptions = {}): Promise<DiscoveryResult> {
    const { url, gitAuth } = this.parseRemote(gitUrl, auth);
    await mkdir(this.options.tmpDir, { recursive: true });
    const path = join(this.options.tmpDir, `${DISCOVERY_PREFIX}${uuidv4()}`);

    try {
      const branch = await this.git.clone(url, '', gitAuth, path, options);
      const composeFiles = await discoverComposeFiles(path);
      projectLogger.info({ gitUrl: url, branch, count: composeFiles.length }, 'Discovered compose files');
      return { path, branch, composeFiles };
    } catch (err) {
      await this.discardDiscovery(path);
      throw err;
    }
  }

  async discardDiscovery(path: string): Promise<void> {
    this.assertDiscoveryPath(path);
    await rm(path, { recursive: true, force: true });
  }

  private parseRemote(gitUrl: string, auth: GitAuth | null): { url: string; gitAuth: GitAuth | null } {
    const url = gitUrl.trim();
    if (!isValidGitUrl(url)) {
      throw new ValidationError('Git URL must be an http(s), ssh, git or file URL');
    }
    return { url, gitAuth: parseInput(GitAuthInputSchema.nullable(), auth) };
  }

  private assertDiscoveryPath(path: string): void {
    const resolved = resolve(path);
    const parent = resolve(this.options.tmpDir);
    const name = relative(parent, resolved);
    if (!name.startsWith(DISCOVERY_PREFIX) || name.includes(sep)) {
      throw new ValidationError(`Not a discovery directory: ${path}`);
    }
  }
}
