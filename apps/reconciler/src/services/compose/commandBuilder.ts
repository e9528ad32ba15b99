import { join } from 'path';

/**
 * The parts of a project the compose CLI needs.
 */
export interface ComposeProjectSpec {
  name: string;
  /** Checkout root; compose files resolve against it. */
  workingDir: string;
  composeFiles: string[];
  composeOverride: string | null;
  variables: string[];
}

export interface ComposeCommand {
  binary: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  /** Written to the child's stdin (the override document), or null. */
  stdin: string | null;
}

export interface UpOptions {
  /** When false, containers are created but not started. */
  startServices?: boolean;
}

export interface DownOptions {
  removeVolumes?: boolean;
}

export interface LogsOptions {
  follow?: boolean;
}

/**
 * Compose project names are restricted to lowercase letters, digits,
 * dashes and underscores, starting with a letter or digit.
 */
export function composeProjectName(name: string): string {
  const normalized = name
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '_')
    .replace(/^[^a-z0-9]+/, '');
  return normalized === '' ? 'project' : normalized;
}

/**
 * Host environment, then NO_COLOR, then the project's variables. Later
 * entries win, so project variables override the host.
 */
export function buildComposeEnv(variables: string[], baseEnv: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv, NO_COLOR: '1' };
  for (const entry of variables) {
    const trimmed = entry.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;
    const separator = trimmed.indexOf('=');
    if (separator <= 0) continue;
    env[trimmed.slice(0, separator)] = trimmed.slice(separator + 1);
  }
  return env;
}

export class ComposeCommandBuilder {
  constructor(
    private readonly binary: string = 'docker',
    private readonly baseEnv: NodeJS.ProcessEnv = process.env
  ) {}

  build(project: ComposeProjectSpec, subcommand: string, subArgs: string[] = []): ComposeCommand {
    const args = ['compose', '--progress', 'plain', '--project-name', composeProjectName(project.name)];
    for (const file of project.composeFiles) {
      args.push('--file', join(project.workingDir, file));
    }
    if (project.composeOverride !== null) {
      args.push('--file', '-');
    }
    args.push(subcommand, ...subArgs);

    return {
      binary: this.binary,
      args,
      env: buildComposeEnv(project.variables, this.baseEnv),
      stdin: project.composeOverride,
    };
  }

  up(project: ComposeProjectSpec, options: UpOptions = {}): ComposeCommand {
    const args = ['--detach', '--quiet-pull', '--quiet-build', '--remove-orphans'];
    if (options.startServices === false) {
      args.push('--no-start');
    }
    return this.build(project, 'up', args);
  }

  down(project: ComposeProjectSpec, options: DownOptions = {}): ComposeCommand {
    const args = ['--remove-orphans'];
    if (options.removeVolumes) {
      args.push('--volumes');
    }
    return this.build(project, 'down', args);
  }

  logs(project: ComposeProjectSpec, options: LogsOptions = {}): ComposeCommand {
    return this.build(project, 'logs', options.follow ? ['--follow'] : []);
  }

  config(project: ComposeProjectSpec): ComposeCommand {
    return this.build(project, 'config');
  }

  ps(project: ComposeProjectSpec): ComposeCommand {
    return this.build(project, 'ps', ['--all', '--format', 'json']);
  }

  pull(project: ComposeProjectSpec): ComposeCommand {
    return this.build(project, 'pull');
  }

  buildImages(project: ComposeProjectSpec): ComposeCommand {
    return this.build(project, 'build');
  }
}
