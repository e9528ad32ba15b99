export type ComposeProjectStatus = 'running' | 'stopped' | 'failed' | 'unknown';

/**
 * One container as reported by `docker compose ps --format json`.
 * Field names follow the compose output.
 */
export interface ContainerInfo {
  Service: string;
  Name: string;
  State: string;
  Status: string;
  RunningFor: string;
  ExitCode: number;
}

export interface ComposeStatus {
  status: ComposeProjectStatus;
  containers: ContainerInfo[];
  /** Age of the first running container, e.g. "2 hours". Empty when nothing runs. */
  uptime: string;
}
