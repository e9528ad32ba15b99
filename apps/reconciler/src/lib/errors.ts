/**
 * Error taxonomy for the reconciler. Every error carries a stable `code`
 * and an HTTP-style `statusCode` so an outer surface can map it directly.
 */

export class ReconcilerError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends ReconcilerError {
  constructor(message: string, readonly issues: string[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class NotFoundError extends ReconcilerError {
  constructor(readonly resource: 'project' | 'deployment', readonly id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404);
  }
}

export type GitErrorKind = 'auth' | 'network' | 'ref' | 'repository' | 'unknown';

export class GitError extends ReconcilerError {
  constructor(
    message: string,
    readonly kind: GitErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, 'GIT_ERROR', 502, options);
  }

  /** Only network failures are worth another attempt. */
  get retryable(): boolean {
    return this.kind === 'network';
  }
}

export interface ProcessErrorDetails {
  command: string[];
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export class ProcessError extends ReconcilerError {
  readonly command: string[];
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, details: ProcessErrorDetails) {
    super(message, 'PROCESS_ERROR', 500);
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.signal = details.signal;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }
}

export class DecryptionError extends ReconcilerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DECRYPTION_ERROR', 500, options);
  }
}

export class CancellationError extends ReconcilerError {
  constructor(message = 'Operation cancelled') {
    super(message, 'CANCELLED', 499);
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function isAbortError(err: unknown): boolean {
  return err instanceof CancellationError || (err instanceof Error && err.name === 'AbortError');
}

/**
 * Turn any error into a short message fit for an operator.
 */
export function formatErrorForUser(err: unknown): string {
  if (err === null || err === undefined) return '';

  if (err instanceof ValidationError) return err.message;
  if (err instanceof NotFoundError) return `${err.resource} not found`;
  if (err instanceof CancellationError) return 'operation cancelled';
  if (err instanceof DecryptionError) return 'stored credentials could not be decrypted; re-enter them';
  if (err instanceof GitError) {
    switch (err.kind) {
      case 'auth':
        return 'git authentication failed; check the repository credentials';
      case 'network':
        return 'could not reach the git remote';
      case 'ref':
        return 'branch not found on the git remote';
      case 'repository':
        return 'git repository not found';
      default:
        return 'git operation failed';
    }
  }
  if (err instanceof ProcessError) {
    return err.exitCode === null ? 'docker compose was terminated' : `docker compose exited with code ${err.exitCode}`;
  }

  const message = toError(err).message.toLowerCase();
  if (message.includes('unique constraint') && message.includes('name')) {
    return 'a project with this name already exists';
  }
  if (message.includes('unique constraint')) return 'this entry already exists';
  if (message.includes('permission denied')) return 'permission denied';
  if (message.includes('timeout') || message.includes('timed out')) return 'operation timed out';
  return 'an unexpected error occurred';
}
