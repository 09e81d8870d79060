import { findMarkdownFiles, isDirectory, OUTPUT_EXTENSION, parseNumber } from './command-builder.js';
import type { ConvertForm, DownloadForm } from './form-state.js';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function validateDownload(form: DownloadForm): string | null {
  const url = form.url.trim();
  if (!url) {
    return 'Substack URL is required.';
  }
  if (!url.startsWith('http')) {
    return 'URL must start with http:// or https://';
  }

  if (!form.outputDir.trim()) {
    return 'Please select an output folder.';
  }

  const rate = form.rateLimit.trim();
  if (rate) {
    const value = parseNumber(rate);
    if (value === undefined) {
      return 'Rate must be a number (e.g. 1 or 0.5).';
    }
    if (value <= 0) {
      return 'Rate must be a positive number.';
    }
  }

  if (form.datesEnabled) {
    const after = form.afterDate.trim();
    const before = form.beforeDate.trim();
    if (after && !DATE_PATTERN.test(after)) {
      return 'After date must be in YYYY-MM-DD format.';
    }
    if (before && !DATE_PATTERN.test(before)) {
      return 'Before date must be in YYYY-MM-DD format.';
    }
  }

  return null;
}

export function validateConvert(form: ConvertForm): string | null {
  const source = form.sourceDir.trim();
  if (!source) {
    return 'Please select a source folder containing .md files.';
  }
  if (!isDirectory(source)) {
    return `Source folder does not exist:\n${source}`;
  }

  if (findMarkdownFiles(source).length === 0) {
    return (
      'No .md files found in the source folder (excluding index.md).\n' +
      'Make sure you downloaded in Markdown format first.'
    );
  }

  const output = form.outputFile.trim();
  if (!output) {
    return 'Please choose an output .epub file path.';
  }
  if (!output.toLowerCase().endsWith(OUTPUT_EXTENSION)) {
    return 'Output file must have a .epub extension.';
  }

  return null;
}
