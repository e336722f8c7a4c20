import fs from 'fs';
import path from 'path';
import { DEFAULT_MANIFEST_FILE, SNAPSHOT_CONSTANTS } from '../config/constants.js';
import { loadConfig } from '../config/loader.js';
import type { DepsnapConfig } from '../config/types.js';
import { ManifestProject } from '../project/ManifestProject.js';
import { createDefaultFilters } from '../snapshot/filters/index.js';
import type { DependenciesSnapshot } from '../snapshot/DependenciesSnapshot.js';
import type { SnapshotHost } from '../subscriptions/SnapshotHost.js';
import { log, parseLogLevel, LogLevel } from '../utils/logger.js';

export interface ProjectSession {
  project: ManifestProject;
  host: SnapshotHost;
  config: DepsnapConfig;
}

/**
 * A directory argument means the manifest inside it.
 */
export function resolveManifestPath(target = '.'): string {
  const resolved = path.resolve(target);
  if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
    return path.join(resolved, DEFAULT_MANIFEST_FILE);
  }
  return resolved;
}

export async function openProjectSession(target?: string): Promise<ProjectSession> {
  const manifestPath = resolveManifestPath(target);
  const config = loadConfig(path.dirname(manifestPath));

  if (config.logLevel) {
    log.setLevel(parseLogLevel(config.logLevel, LogLevel.INFO));
  }

  const project = await ManifestProject.load(manifestPath);
  const host = await project.open({
    throttleMs: config.throttleMs,
    filters: createDefaultFilters(config.disabledFilters),
  });

  return { project, host, config };
}

/**
 * Resolve with the first published snapshot, or with the current one when
 * nothing is published within a few debounce windows.
 */
export function waitForSnapshot(session: ProjectSession): Promise<DependenciesSnapshot> {
  const throttleMs = session.config.throttleMs ?? SNAPSHOT_CONSTANTS.THROTTLE_MS;

  return new Promise(resolve => {
    const timer = setTimeout(() => {
      subscription.dispose();
      resolve(session.host.currentSnapshot);
    }, throttleMs * 4);

    const subscription = session.host.onSnapshotChanged(event => {
      clearTimeout(timer);
      subscription.dispose();
      resolve(event.snapshot);
    });
  });
}

export async function closeProjectSession(session: ProjectSession): Promise<void> {
  session.project.unload();
  session.host.dispose();
  await session.project.dispose();
}
