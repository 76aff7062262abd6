import * as fsExtra from 'fs-extra';
import { artifactsLogger } from '@core/utils/logger';

const pending = new Set<string>();
let hooked = false;

function purge(): void {
  for (const file of pending) {
    try {
      fsExtra.removeSync(file);
    } catch (error) {
      artifactsLogger.debug('Could not remove generated source at exit', {
        file,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
  pending.clear();
}

/**
 * Schedule a generated file for best-effort removal when the process exits.
 */
export function deleteOnExit(file: string): void {
  pending.add(file);
  if (!hooked) {
    hooked = true;
    process.once('exit', purge);
  }
}

/** Drop a file from the exit list, e.g. because it was already removed. */
export function cancelDeleteOnExit(file: string): void {
  pending.delete(file);
}

export function pendingExitDeletions(): readonly string[] {
  return [...pending];
}
