import { dirname, join, normalize } from 'path';
import type { FinishedEvent } from './process-runner.js';
import type { ConvertForm, DownloadForm } from './form-state.js';

export type DialogAction =
  | { kind: 'open-folder'; label: string; path: string }
  | { kind: 'create-epub'; label: string; sourceDir: string; outputFile: string }
  | { kind: 'dismiss'; label: string };

export interface Dialog {
  title: string;
  heading: string;
  detail: string;
  tone: 'success' | 'info' | 'error';
  actions: DialogAction[];
}

const RETURN_TO_APP: DialogAction = { kind: 'dismiss', label: 'Return to App' };

export function downloadCompleteDialog(outputFolder: string, dryRun: boolean): Dialog {
  if (dryRun) {
    return {
      title: 'Download Complete',
      heading: 'Dry Run Complete',
      detail:
        'No files were downloaded. This was a preview only.\n\n' +
        "Turn off 'Dry run' and choose Start Download to download for real.",
      tone: 'info',
      actions: [RETURN_TO_APP],
    };
  }

  const folder = normalize(outputFolder);
  return {
    title: 'Download Complete',
    heading: 'Download Complete!',
    detail: `Files saved to:\n${outputFolder}`,
    tone: 'success',
    actions: [
      {
        kind: 'create-epub',
        label: 'Create ePub →',
        sourceDir: folder,
        outputFile: join(folder, 'archive.epub'),
      },
      { kind: 'open-folder', label: 'Show Files', path: outputFolder },
      RETURN_TO_APP,
    ],
  };
}

export function epubCompleteDialog(epubPath: string): Dialog {
  const folder = dirname(epubPath) || epubPath;
  return {
    title: 'Conversion Complete',
    heading: 'ePub Created!',
    detail: `Saved to:\n${epubPath}`,
    tone: 'success',
    actions: [{ kind: 'open-folder', label: 'Show File', path: folder }, RETURN_TO_APP],
  };
}

export function errorDialog(title: string, message: string): Dialog {
  return {
    title,
    heading: title,
    detail: message,
    tone: 'error',
    actions: [{ kind: 'dismiss', label: 'OK' }],
  };
}

/**
 * Picks the dialog for a finished run. Failed runs get none: their output and
 * exit status are already in the log.
 */
export function completionDialog(
  event: FinishedEvent,
  download: DownloadForm,
  convert: ConvertForm,
): Dialog | null {
  if (!event.success) {
    return null;
  }

  switch (event.operation) {
    case 'download':
      return downloadCompleteDialog(download.outputDir.trim(), download.dryRun);
    case 'convert':
      return epubCompleteDialog(convert.outputFile.trim());
  }
}
