import { spawn, type ChildProcess } from 'child_process';
import { once } from 'events';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import type { StreamMessage } from '@dockhand/shared';
import type { BoundedChannel } from '../../lib/boundedChannel.js';
import { CancellationError, ProcessError } from '../../lib/errors.js';
import { composeLogger } from '../../lib/logger.js';

/**
 * How a command's output is consumed.
 * - blocking: captured and returned when the process exits
 * - streaming: forwarded line by line into a bounded channel, and captured
 * - piping: written straight to this process's stdout/stderr
 */
export type ExecutionMode =
  | { kind: 'blocking' }
  | { kind: 'streaming'; channel: BoundedChannel<StreamMessage> }
  | { kind: 'piping' };

export const BLOCKING: ExecutionMode = { kind: 'blocking' };

export interface ProcessResult {
  stdout: string;
  stderr: string;
  /** Both streams in the order their chunks arrived. */
  combined: string;
}

export interface RunOptions {
  mode: ExecutionMode;
  env?: NodeJS.ProcessEnv;
  stdin?: string | null;
  signal?: AbortSignal;
}

export interface ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult>;
}

export interface ChildProcessRunnerOptions {
  /** Time between SIGTERM and SIGKILL on cancellation. */
  stopGracePeriodMs: number;
  /** Applied to stderr lines before they are forwarded in streaming mode. */
  transformStderr?: (line: string) => string;
}

/**
 * Signal every process in the child's group. Children are spawned detached,
 * so the group id equals the child's pid.
 */
export function killProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ESRCH') {
      return;
    }
    composeLogger.warn({ pid: child.pid, signal, err }, 'Failed to signal process group, signalling child only');
    child.kill(signal);
  }
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

interface Capture {
  stdout: string[];
  stderr: string[];
  combined: string[];
}

/**
 * Runs commands as child processes, one process group per command.
 */
export class ChildProcessRunner implements ProcessRunner {
  private readonly active = new Set<ChildProcess>();

  constructor(private readonly options: ChildProcessRunnerOptions) {}

  get activeCount(): number {
    return this.active.size;
  }

  /**
   * SIGTERM every running child's group; used on shutdown.
   */
  terminateAll(): void {
    for (const child of this.active) {
      killProcessGroup(child, 'SIGTERM');
    }
  }

  async run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    const { mode, signal } = options;
    if (signal?.aborted) {
      throw new CancellationError(`${command} cancelled before start`);
    }

    const piping = mode.kind === 'piping';
    const child = spawn(command, args, {
      env: options.env ?? process.env,
      detached: true,
      stdio: [options.stdin != null ? 'pipe' : 'ignore', piping ? 'inherit' : 'pipe', piping ? 'inherit' : 'pipe'],
    });
    this.active.add(child);
    composeLogger.debug({ command, args, pid: child.pid, mode: mode.kind }, 'Process started');

    const capture: Capture = { stdout: [], stderr: [], combined: [] };
    const readersDone: Array<Promise<unknown>> = [];

    if (child.stdout && child.stderr) {
      if (mode.kind === 'streaming') {
        readersDone.push(this.readLines(child.stdout, 'stdout', capture, mode.channel));
        readersDone.push(this.readLines(child.stderr, 'stderr', capture, mode.channel));
      } else {
        readersDone.push(this.collect(child.stdout, 'stdout', capture));
        readersDone.push(this.collect(child.stderr, 'stderr', capture));
      }
    }

    if (child.stdin) {
      child.stdin.on('error', (err) => {
        composeLogger.debug({ pid: child.pid, err }, 'Child closed stdin early');
      });
      child.stdin.end(options.stdin ?? '');
    }

    let cancelled = false;
    let killTimer: NodeJS.Timeout | undefined;
    const onAbort = (): void => {
      cancelled = true;
      composeLogger.info({ pid: child.pid, command }, 'Cancelling process group');
      killProcessGroup(child, 'SIGTERM');
      killTimer = setTimeout(() => {
        composeLogger.warn({ pid: child.pid, command }, 'Process group ignored SIGTERM, sending SIGKILL');
        killProcessGroup(child, 'SIGKILL');
      }, this.options.stopGracePeriodMs);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      let exit: ExitStatus;
      try {
        exit = await new Promise<ExitStatus>((resolve, reject) => {
          child.once('error', reject);
          child.once('close', (code, exitSignal) => resolve({ code, signal: exitSignal }));
        });
      } catch (err) {
        child.stdout?.destroy();
        child.stderr?.destroy();
        await Promise.allSettled(readersDone);
        const message = err instanceof Error ? err.message : String(err);
        throw new ProcessError(`Failed to start ${command}: ${message}`, {
          command: [command, ...args],
          exitCode: null,
          signal: null,
          stdout: '',
          stderr: message,
        });
      }
      await Promise.all(readersDone);

      const result: ProcessResult = {
        stdout: capture.stdout.join(''),
        stderr: capture.stderr.join(''),
        combined: capture.combined.join(''),
      };

      if (cancelled) {
        throw new CancellationError(`${command} ${args.join(' ')} cancelled`);
      }
      if (exit.code !== 0) {
        const reason = exit.code === null ? `was killed by ${exit.signal}` : `exited with code ${exit.code}`;
        throw new ProcessError(`${command} ${args.join(' ')} ${reason}`, {
          command: [command, ...args],
          exitCode: exit.code,
          signal: exit.signal,
          stdout: result.stdout,
          stderr: result.stderr,
        });
      }
      return result;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (killTimer) clearTimeout(killTimer);
      this.active.delete(child);
    }
  }

  private async collect(stream: Readable, type: 'stdout' | 'stderr', capture: Capture): Promise<void> {
    stream.setEncoding('utf8');
    for await (const chunk of stream) {
      const text = String(chunk);
      capture[type].push(text);
      capture.combined.push(text);
    }
  }

  /**
   * Forward lines until the channel refuses one, then keep draining the pipe
   * so the child never blocks on a full buffer. Every line is captured.
   */
  private async readLines(
    stream: Readable,
    type: 'stdout' | 'stderr',
    capture: Capture,
    channel: BoundedChannel<StreamMessage>
  ): Promise<void> {
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    const transform = type === 'stderr' ? this.options.transformStderr : undefined;
    let forwarding = true;

    lines.on('line', (line) => {
      capture[type].push(`${line}\n`);
      capture.combined.push(`${line}\n`);
      if (!forwarding) return;
      const content = transform ? transform(line) : line;
      if (!channel.trySend({ type, content })) {
        forwarding = false;
        composeLogger.debug({ stream: type }, 'Output channel full or closed, dropping further lines');
      }
    });

    await once(lines, 'close');
  }
}
