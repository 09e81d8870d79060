import { type ChildProcess, spawn } from 'child_process';
import { normalize } from 'path';
import { errorMessage } from './errors.js';
import log from './logger.js';

export function fileManagerCommand(platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') return 'explorer';
  if (platform === 'darwin') return 'open';
  return 'xdg-open';
}

/**
 * Opens `folder` in the desktop file manager. Resolves with an error message
 * when the file manager could not be started.
 */
export function openInFileManager(folder: string): Promise<string | null> {
  const command = fileManagerCommand();

  return new Promise(resolve => {
    let child: ChildProcess;
    try {
      child = spawn(command, [normalize(folder)], { detached: true, stdio: 'ignore', windowsHide: true });
    } catch (err) {
      log.error(`Could not start ${command}: ${errorMessage(err)}`);
      resolve(`Could not open the file manager:\n${errorMessage(err)}`);
      return;
    }

    child.once('error', (err: Error) => {
      log.error(`Could not start ${command}: ${errorMessage(err)}`);
      resolve(`Could not open the file manager:\n${errorMessage(err)}`);
    });
    child.once('spawn', () => {
      child.unref();
      resolve(null);
    });
  });
}
