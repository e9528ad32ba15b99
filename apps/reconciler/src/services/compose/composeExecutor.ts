import { join } from 'path';
import type { ComposeStatus, Project } from '@dockhand/shared';
import { composeLogger } from '../../lib/logger.js';
import {
  ComposeCommandBuilder,
  type ComposeCommand,
  type ComposeProjectSpec,
  type DownOptions,
  type LogsOptions,
  type UpOptions,
} from './commandBuilder.js';
import { BLOCKING, type ExecutionMode, type ProcessResult, type ProcessRunner } from './processRunner.js';
import { parseComposeStatus } from './statusParser.js';

export interface ComposeRunOptions {
  mode?: ExecutionMode;
  signal?: AbortSignal;
}

/**
 * What the orchestrator needs from compose.
 */
export interface ComposeRunner {
  up(project: Project, options?: ComposeRunOptions & UpOptions): Promise<ProcessResult>;
  down(project: Project, options?: ComposeRunOptions & DownOptions): Promise<ProcessResult>;
  logs(project: Project, options?: ComposeRunOptions & LogsOptions): Promise<ProcessResult>;
  config(project: Project, options?: { signal?: AbortSignal }): Promise<string>;
  status(project: Project, options?: { signal?: AbortSignal }): Promise<ComposeStatus>;
  pull(project: Project, options?: ComposeRunOptions): Promise<ProcessResult>;
  build(project: Project, options?: ComposeRunOptions): Promise<ProcessResult>;
}

/** The checkout inside a project's working directory. */
export function projectGitDir(project: Pick<Project, 'workingDir'>): string {
  return join(project.workingDir, 'git');
}

export function toComposeSpec(project: Project): ComposeProjectSpec {
  return {
    name: project.name,
    workingDir: projectGitDir(project),
    composeFiles: project.composeFiles,
    composeOverride: project.composeOverride,
    variables: project.variables,
  };
}

export class ComposeExecutor implements ComposeRunner {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly commands: ComposeCommandBuilder = new ComposeCommandBuilder()
  ) {}

  up(project: Project, options: ComposeRunOptions & UpOptions = {}): Promise<ProcessResult> {
    return this.execute(project, this.commands.up(toComposeSpec(project), options), options);
  }

  down(project: Project, options: ComposeRunOptions & DownOptions = {}): Promise<ProcessResult> {
    return this.execute(project, this.commands.down(toComposeSpec(project), options), options);
  }

  logs(project: Project, options: ComposeRunOptions & LogsOptions = {}): Promise<ProcessResult> {
    return this.execute(project, this.commands.logs(toComposeSpec(project), options), options);
  }

  async config(project: Project, options: { signal?: AbortSignal } = {}): Promise<string> {
    const result = await this.execute(project, this.commands.config(toComposeSpec(project)), options);
    return result.stdout;
  }

  async status(project: Project, options: { signal?: AbortSignal } = {}): Promise<ComposeStatus> {
    const result = await this.execute(project, this.commands.ps(toComposeSpec(project)), options);
    return parseComposeStatus(result.stdout);
  }

  pull(project: Project, options: ComposeRunOptions = {}): Promise<ProcessResult> {
    return this.execute(project, this.commands.pull(toComposeSpec(project)), options);
  }

  build(project: Project, options: ComposeRunOptions = {}): Promise<ProcessResult> {
    return this.execute(project, this.commands.buildImages(toComposeSpec(project)), options);
  }

  private execute(project: Project, command: ComposeCommand, options: ComposeRunOptions): Promise<ProcessResult> {
    const mode = options.mode ?? BLOCKING;
    composeLogger.debug({ projectId: project.id, args: command.args, mode: mode.kind }, 'Running compose');
    return this.runner.run(command.binary, command.args, {
      mode,
      env: command.env,
      stdin: command.stdin,
      signal: options.signal,
    });
  }
}
