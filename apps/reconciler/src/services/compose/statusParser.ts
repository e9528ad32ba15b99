import { ContainerInfoSchema, type ComposeProjectStatus, type ComposeStatus, type ContainerInfo } from '@dockhand/shared';
import { composeLogger } from '../../lib/logger.js';

function parseLine(line: string): ContainerInfo[] {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    composeLogger.warn({ line, err }, 'Skipping malformed container JSON');
    return [];
  }

  // Older compose releases print one JSON array instead of one object per line
  const items = Array.isArray(value) ? value : [value];
  const containers: ContainerInfo[] = [];
  for (const item of items) {
    const result = ContainerInfoSchema.safeParse(item);
    if (result.success) {
      containers.push(result.data);
    } else {
      composeLogger.warn({ line, issues: result.error.issues }, 'Skipping container entry with unexpected shape');
    }
  }
  return containers;
}

/**
 * Parse `docker compose ps --format json` output.
 */
export function parseContainers(output: string): ContainerInfo[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .flatMap(parseLine);
}

/**
 * Reduce container states to one project status. Containers that exited
 * cleanly (init and migration jobs) do not count.
 */
export function reduceComposeStatus(containers: ContainerInfo[]): ComposeStatus {
  let status: ComposeProjectStatus = 'stopped';
  let uptime = '';

  if (containers.length > 0) {
    let running = 0;
    let relevant = 0;

    for (const container of containers) {
      if (container.State === 'exited' && container.ExitCode === 0) {
        continue;
      }
      relevant++;
      if (container.State === 'running') {
        running++;
        if (uptime === '') {
          uptime = container.RunningFor.replace(/ ago$/, '');
        }
      }
    }

    if (relevant === 0) {
      status = 'unknown';
    } else if (running === relevant) {
      status = 'running';
    } else if (running > 0) {
      status = 'failed';
    }
  }

  return { status, containers, uptime };
}

export function parseComposeStatus(output: string): ComposeStatus {
  return reduceComposeStatus(parseContainers(output));
}
