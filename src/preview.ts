import { join } from 'path';
import {
  type ArgVector,
  CONVERTER_EXECUTABLE,
  DEFAULT_AUTHOR,
  DEFAULT_SPLIT_LEVEL,
  DEFAULT_TITLE,
  findMarkdownFiles,
  isDirectory,
  resolveExecutable,
} from './command-builder.js';
import type { ConvertForm, ToolPaths } from './form-state.js';

export const CONVERT_NOT_READY =
  '(Select a source folder containing .md files and an output path)';

export const NO_MARKDOWN_HINT =
  'No .md files found (excluding index.md).\nMake sure you downloaded using Markdown format first.';

/**
 * Pandoc gets one argument per article, so the full vector is unreadable for a
 * real archive. This renders the first file and a count instead.
 */
export function formatConvertPreview(
  command: ArgVector | null,
  form: ConvertForm,
  tools: ToolPaths,
): string {
  if (command === null) {
    return CONVERT_NOT_READY;
  }

  const sourceDir = form.sourceDir.trim();
  const files = sourceDir ? findMarkdownFiles(sourceDir) : [];
  const output = form.outputFile.trim() || '<output.epub>';
  const title = form.title.trim() || DEFAULT_TITLE;
  const author = form.author.trim() || DEFAULT_AUTHOR;
  const split = form.splitLevel.trim() || DEFAULT_SPLIT_LEVEL;

  const lines = [resolveExecutable(tools.converterPath, CONVERTER_EXECUTABLE)];
  if (files.length > 0) {
    lines.push(`  "${join(sourceDir, files[0])}"`);
    if (files.length > 1) {
      lines.push(`  ... (${files.length} .md files total, sorted by name)`);
    }
  }
  lines.push(`  -o "${output}"`);
  lines.push(`  --metadata title="${title}"`);
  lines.push(`  --metadata author="${author}"`);
  if (form.toc) {
    lines.push('  --toc');
  }
  lines.push(`  --split-level=${split}`);

  return lines.join(' \\\n');
}

export function describeSourceFolder(sourceDir: string): string {
  const source = sourceDir.trim();
  if (!source) {
    return '(No folder selected)';
  }
  if (!isDirectory(source)) {
    return '(Folder does not exist)';
  }

  const files = findMarkdownFiles(source);
  if (files.length === 0) {
    return NO_MARKDOWN_HINT;
  }
  return `Found ${files.length} file(s):\n${files.join('\n')}`;
}
