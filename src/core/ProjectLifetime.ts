import { ProjectUnloadedError } from '../utils/error-utils.js';
import { Emitter } from '../utils/events.js';
import type { ProjectRenamedEvent, ProjectTasksService, UnconfiguredProject } from './types.js';

/**
 * Load/unload/rename lifecycle of one project, plus the scoped-execution
 * primitive that refuses work once unloading has started.
 */
export class ProjectLifetime implements UnconfiguredProject, ProjectTasksService {
  private readonly controller = new AbortController();
  private readonly unloading = new Emitter<void>('project.unloading');
  private readonly renamed = new Emitter<ProjectRenamedEvent>('project.renamed');
  private path: string;

  readonly onUnloading = this.unloading.event;
  readonly onRenamed = this.renamed.event;

  constructor(fullPath: string) {
    this.path = fullPath;
  }

  get fullPath(): string {
    return this.path;
  }

  get unloadSignal(): AbortSignal {
    return this.controller.signal;
  }

  get isUnloaded(): boolean {
    return this.controller.signal.aborted;
  }

  async loadedProject<T>(work: () => Promise<T>): Promise<T> {
    if (this.controller.signal.aborted) {
      throw new ProjectUnloadedError(this.path);
    }
    return work();
  }

  rename(newPath: string): void {
    const oldPath = this.path;
    if (oldPath === newPath) return;
    this.path = newPath;
    this.renamed.fire({ oldPath, newPath });
  }

  /** Raise unloading listeners once, then abort the unload signal. */
  unload(): void {
    if (this.controller.signal.aborted) return;
    this.unloading.fire();
    this.controller.abort();
    this.unloading.dispose();
    this.renamed.dispose();
  }
}
