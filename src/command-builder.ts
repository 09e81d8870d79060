import { readdirSync, statSync } from 'fs';
import { join } from 'path';
import {
  type ConvertForm,
  DEFAULT_FILES_DIR,
  DEFAULT_IMAGES_DIR,
  DEFAULT_RATE,
  type DownloadForm,
  type ToolPaths,
} from './form-state.js';

export type ArgVector = readonly string[];

export const DOWNLOADER_EXECUTABLE = 'sbstck-dl';
export const CONVERTER_EXECUTABLE = 'pandoc';

export const FORMAT_OPTIONS = [
  { label: 'Markdown (.md)', code: 'md' },
  { label: 'HTML (.html)', code: 'html' },
  { label: 'Plain Text (.txt)', code: 'txt' },
] as const;

export const FORMAT_LABELS: readonly string[] = FORMAT_OPTIONS.map(option => option.label);

export const INPUT_EXTENSION = '.md';
export const OUTPUT_EXTENSION = '.epub';
export const INDEX_FILE = 'index.md';

export const DEFAULT_TITLE = 'Substack Archive';
export const DEFAULT_AUTHOR = 'Unknown';
export const DEFAULT_SPLIT_LEVEL = '1';

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SHELL_SENSITIVE = /[ &|<>()"]/;

export function formatCode(label: string): string {
  const option = FORMAT_OPTIONS.find(candidate => candidate.label === label);
  return option ? option.code : FORMAT_OPTIONS[0].code;
}

/** Parses a decimal number; anything else, including an empty string, is undefined. */
export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

// Whole numbers keep a trailing ".0": `2` -> `2.0`.
function formatRate(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function resolveExecutable(configured: string, fallback: string): string {
  return configured.trim() || fallback;
}

export function buildDownloadCommand(form: DownloadForm, tools: ToolPaths): ArgVector {
  const cmd = [resolveExecutable(tools.downloaderPath, DOWNLOADER_EXECUTABLE), 'download'];

  const url = form.url.trim();
  if (url) {
    cmd.push('--url', url);
  }

  const outputDir = form.outputDir.trim();
  if (outputDir) {
    cmd.push('-o', outputDir);
  }

  cmd.push('-f', formatCode(form.format));

  if (form.datesEnabled) {
    const after = form.afterDate.trim();
    const before = form.beforeDate.trim();
    if (after) {
      cmd.push('--after', after);
    }
    if (before) {
      cmd.push('--before', before);
    }
  }

  if (form.downloadImages) {
    cmd.push('--download-images', '--image-quality', form.imageQuality);
    const imagesDir = form.imagesDir.trim();
    if (imagesDir && imagesDir !== DEFAULT_IMAGES_DIR) {
      cmd.push('--images-dir', imagesDir);
    }
  }

  if (form.downloadFiles) {
    cmd.push('--download-files');
    const extensions = form.fileExtensions.trim();
    if (extensions) {
      cmd.push('--file-extensions', extensions);
    }
    const filesDir = form.filesDir.trim();
    if (filesDir && filesDir !== DEFAULT_FILES_DIR) {
      cmd.push('--files-dir', filesDir);
    }
  }

  if (form.addSourceUrl) {
    cmd.push('--add-source-url');
  }

  if (form.createArchive) {
    cmd.push('--create-archive');
  }

  const rate = form.rateLimit.trim();
  if (rate && rate !== DEFAULT_RATE) {
    const value = parseNumber(rate);
    if (value !== undefined) {
      cmd.push('-r', formatRate(value));
    }
  }

  if (form.verbose) {
    cmd.push('-v');
  }

  if (form.dryRun) {
    cmd.push('-d');
  }

  const cookieValue = form.cookieValue.trim();
  if (cookieValue) {
    cmd.push('--cookie_name', form.cookieName, '--cookie_val', cookieValue);
  }

  return cmd;
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
  } catch {
    return false;
  }
}

export function findMarkdownFiles(sourceDir: string): string[] {
  let entries: string[];
  try {
    entries = readdirSync(sourceDir);
  } catch {
    return [];
  }

  return entries
    .filter(name => {
      const lower = name.toLowerCase();
      return lower.endsWith(INPUT_EXTENSION) && lower !== INDEX_FILE;
    })
    .sort();
}

/** Returns null while the source folder has nothing to convert. */
export function buildConvertCommand(form: ConvertForm, tools: ToolPaths): ArgVector | null {
  const sourceDir = form.sourceDir.trim();
  if (!sourceDir || !isDirectory(sourceDir)) {
    return null;
  }

  const files = findMarkdownFiles(sourceDir);
  if (files.length === 0) {
    return null;
  }

  const cmd = [resolveExecutable(tools.converterPath, CONVERTER_EXECUTABLE)];
  cmd.push(...files.map(file => join(sourceDir, file)));

  const output = form.outputFile.trim();
  if (output) {
    cmd.push('-o', output);
  }

  cmd.push('--metadata', `title=${form.title.trim() || DEFAULT_TITLE}`);
  cmd.push('--metadata', `author=${form.author.trim() || DEFAULT_AUTHOR}`);

  if (form.toc) {
    cmd.push('--toc');
  }

  cmd.push(`--split-level=${form.splitLevel.trim() || DEFAULT_SPLIT_LEVEL}`);

  return cmd;
}

export function formatCommand(argv: ArgVector): string {
  return argv
    .map(part => (part === '' || SHELL_SENSITIVE.test(part) ? `"${part}"` : part))
    .join(' ');
}
