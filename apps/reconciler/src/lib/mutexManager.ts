import { Mutex } from 'async-mutex';

/**
 * Per-project mutexes. Operations on one project are serialized while
 * different projects proceed in parallel.
 */
export class MutexManager {
  private projectMutexes = new Map<string, Mutex>();

  /**
   * Get or create the mutex for a project.
   */
  getProjectMutex(projectId: string): Mutex {
    let mutex = this.projectMutexes.get(projectId);
    if (!mutex) {
      mutex = new Mutex();
      this.projectMutexes.set(projectId, mutex);
    }
    return mutex;
  }

  /**
   * Run a function exclusively for a project.
   * Deploy, stop, remove and status refresh all go through here.
   */
  async withProjectLock<T>(projectId: string, fn: () => Promise<T>): Promise<T> {
    const mutex = this.getProjectMutex(projectId);
    return mutex.runExclusive(fn);
  }

  isProjectLocked(projectId: string): boolean {
    return this.projectMutexes.get(projectId)?.isLocked() ?? false;
  }

  /**
   * Drop the mutex of a removed project.
   */
  cleanupProjectMutex(projectId: string): void {
    this.projectMutexes.delete(projectId);
  }

  getStats(): { projectMutexes: number } {
    return {
      projectMutexes: this.projectMutexes.size,
    };
  }
}
