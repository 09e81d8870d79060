import { FORMAT_LABELS } from './command-builder.js';
import {
  type ConvertForm,
  type DownloadForm,
  IMAGE_QUALITIES,
  type ImageQuality,
  type Operation,
  type ToolPaths,
} from './form-state.js';
import type { ActiveRun } from './process-runner.js';

export type Tab = 'download' | 'convert' | 'settings';

export const TABS: readonly { id: Tab; title: string }[] = [
  { id: 'download', title: 'Download' },
  { id: 'convert', title: 'ePub Conversion' },
  { id: 'settings', title: 'Settings' },
];

export const ACTION_LABELS: Record<Operation, { label: string; runningLabel: string }> = {
  download: { label: 'Start Download', runningLabel: 'Downloading…' },
  convert: { label: 'Convert to ePub', runningLabel: 'Converting…' },
};

export type Field =
  | { kind: 'section'; id: string; label: string }
  | { kind: 'note'; id: string; text: string }
  | {
      kind: 'text';
      id: string;
      label: string;
      value: string;
      placeholder?: string;
      mask?: boolean;
      onChange: (value: string) => void;
    }
  | { kind: 'toggle'; id: string; label: string; value: boolean; onChange: (value: boolean) => void }
  | {
      kind: 'select';
      id: string;
      label: string;
      value: string;
      options: readonly string[];
      onChange: (value: string) => void;
    }
  | { kind: 'button'; id: string; label: string; busy: boolean; onPress: () => void };

export type FocusableField = Extract<Field, { kind: 'text' | 'toggle' | 'select' | 'button' }>;

export type FieldKey = 'left' | 'right' | 'enter' | 'space';

export function isFocusable(field: Field): field is FocusableField {
  return field.kind === 'text' || field.kind === 'toggle' || field.kind === 'select' || field.kind === 'button';
}

export function cycleOption(options: readonly string[], current: string, delta: number): string {
  if (options.length === 0) {
    return current;
  }
  const index = options.indexOf(current);
  const start = index === -1 ? 0 : index;
  return options[(start + delta + options.length) % options.length];
}

/** Id of the focusable field `delta` steps away, wrapping at both ends. */
export function moveFocus(fields: readonly Field[], currentId: string, delta: number): string {
  const focusable = fields.filter(isFocusable);
  if (focusable.length === 0) {
    return currentId;
  }
  const index = focusable.findIndex(field => field.id === currentId);
  if (index === -1) {
    return focusable[0].id;
  }
  return focusable[(index + delta + focusable.length) % focusable.length].id;
}

/** The focused field, falling back to the first focusable one when `focusId` is hidden. */
export function resolveFocus(fields: readonly Field[], focusId: string): FocusableField | undefined {
  const focusable = fields.filter(isFocusable);
  return focusable.find(field => field.id === focusId) ?? focusable[0];
}

/** Applies a navigation key to a non-text field. Returns false when the key does nothing. */
export function applyKey(field: FocusableField, key: FieldKey): boolean {
  switch (field.kind) {
    case 'toggle':
      field.onChange(!field.value);
      return true;
    case 'select':
      field.onChange(cycleOption(field.options, field.value, key === 'left' ? -1 : 1));
      return true;
    case 'button':
      if (key === 'enter' || key === 'space') {
        field.onPress();
        return true;
      }
      return false;
    case 'text':
      return false;
  }
}

function isImageQuality(value: string): value is ImageQuality {
  return IMAGE_QUALITIES.some(quality => quality === value);
}

function actionButton(operation: Operation, running: ActiveRun | null, onPress: () => void): Field {
  const labels = ACTION_LABELS[operation];
  const busy = running?.operation === operation;
  return { kind: 'button', id: `${operation}-start`, label: busy ? labels.runningLabel : labels.label, busy, onPress };
}

export interface DownloadFieldsContext {
  form: DownloadForm;
  update: (patch: Partial<DownloadForm>) => void;
  showCookies: boolean;
  setShowCookies: (value: boolean) => void;
  revealCookie: boolean;
  setRevealCookie: (value: boolean) => void;
  running: ActiveRun | null;
  onStart: () => void;
  onClearLog: () => void;
}

export function downloadFields(ctx: DownloadFieldsContext): Field[] {
  const { form, update } = ctx;
  const fields: Field[] = [
    { kind: 'section', id: 'source', label: 'Source' },
    {
      kind: 'text',
      id: 'url',
      label: 'Substack URL',
      value: form.url,
      placeholder: 'https://yourname.substack.com/',
      onChange: url => update({ url }),
    },
    { kind: 'section', id: 'destination', label: 'Destination' },
    {
      kind: 'text',
      id: 'output-dir',
      label: 'Output folder',
      value: form.outputDir,
      placeholder: 'Path to a folder…',
      onChange: outputDir => update({ outputDir }),
    },
    {
      kind: 'select',
      id: 'format',
      label: 'Format',
      value: form.format,
      options: FORMAT_LABELS,
      onChange: format => update({ format }),
    },
    { kind: 'section', id: 'dates', label: 'Date Range (optional)' },
    {
      kind: 'toggle',
      id: 'dates-enabled',
      label: 'Filter by date range',
      value: form.datesEnabled,
      onChange: datesEnabled => update({ datesEnabled }),
    },
  ];

  if (form.datesEnabled) {
    fields.push(
      {
        kind: 'text',
        id: 'after-date',
        label: 'After',
        value: form.afterDate,
        placeholder: 'YYYY-MM-DD',
        onChange: afterDate => update({ afterDate }),
      },
      {
        kind: 'text',
        id: 'before-date',
        label: 'Before',
        value: form.beforeDate,
        placeholder: 'YYYY-MM-DD',
        onChange: beforeDate => update({ beforeDate }),
      },
    );
  }

  fields.push(
    { kind: 'section', id: 'images', label: 'Image Options' },
    {
      kind: 'toggle',
      id: 'download-images',
      label: 'Download images locally',
      value: form.downloadImages,
      onChange: downloadImages => update({ downloadImages }),
    },
  );

  if (form.downloadImages) {
    fields.push(
      {
        kind: 'select',
        id: 'image-quality',
        label: 'Quality',
        value: form.imageQuality,
        options: IMAGE_QUALITIES,
        onChange: value => {
          if (isImageQuality(value)) update({ imageQuality: value });
        },
      },
      {
        kind: 'text',
        id: 'images-dir',
        label: 'Images subfolder',
        value: form.imagesDir,
        onChange: imagesDir => update({ imagesDir }),
      },
    );
  }

  fields.push(
    { kind: 'section', id: 'files', label: 'File Attachments' },
    {
      kind: 'toggle',
      id: 'download-files',
      label: 'Download file attachments',
      value: form.downloadFiles,
      onChange: downloadFiles => update({ downloadFiles }),
    },
  );

  if (form.downloadFiles) {
    fields.push(
      {
        kind: 'text',
        id: 'file-extensions',
        label: 'Extensions (blank = all)',
        value: form.fileExtensions,
        placeholder: 'pdf,docx,mp3',
        onChange: fileExtensions => update({ fileExtensions }),
      },
      {
        kind: 'text',
        id: 'files-dir',
        label: 'Files subfolder',
        value: form.filesDir,
        onChange: filesDir => update({ filesDir }),
      },
    );
  }

  fields.push(
    { kind: 'section', id: 'advanced', label: 'Advanced Options' },
    {
      kind: 'toggle',
      id: 'add-source-url',
      label: 'Add source URL to each post',
      value: form.addSourceUrl,
      onChange: addSourceUrl => update({ addSourceUrl }),
    },
    {
      kind: 'toggle',
      id: 'create-archive',
      label: 'Create archive index page (index.md / index.html)',
      value: form.createArchive,
      onChange: createArchive => update({ createArchive }),
    },
    {
      kind: 'toggle',
      id: 'verbose',
      label: 'Verbose output',
      value: form.verbose,
      onChange: verbose => update({ verbose }),
    },
    {
      kind: 'toggle',
      id: 'dry-run',
      label: 'Dry run (preview only, nothing is downloaded)',
      value: form.dryRun,
      onChange: dryRun => update({ dryRun }),
    },
    {
      kind: 'text',
      id: 'rate-limit',
      label: 'Rate limit (requests/sec)',
      value: form.rateLimit,
      onChange: rateLimit => update({ rateLimit }),
    },
    { kind: 'section', id: 'auth', label: 'Paid Content Authentication' },
    {
      kind: 'note',
      id: 'auth-note',
      text: 'Only needed if downloading articles from a paid Substack you subscribe to.',
    },
    {
      kind: 'toggle',
      id: 'show-cookies',
      label: 'Show cookie settings',
      value: ctx.showCookies,
      onChange: ctx.setShowCookies,
    },
  );

  if (ctx.showCookies) {
    fields.push(
      {
        kind: 'text',
        id: 'cookie-name',
        label: 'Cookie name',
        value: form.cookieName,
        onChange: cookieName => update({ cookieName }),
      },
      {
        kind: 'text',
        id: 'cookie-value',
        label: 'Cookie value',
        value: form.cookieValue,
        mask: !ctx.revealCookie,
        onChange: cookieValue => update({ cookieValue }),
      },
      {
        kind: 'toggle',
        id: 'reveal-cookie',
        label: 'Show cookie value',
        value: ctx.revealCookie,
        onChange: ctx.setRevealCookie,
      },
    );
  }

  fields.push(actionButton('download', ctx.running, ctx.onStart), {
    kind: 'button',
    id: 'download-clear-log',
    label: 'Clear Log',
    busy: false,
    onPress: ctx.onClearLog,
  });

  return fields;
}

export interface ConvertFieldsContext {
  form: ConvertForm;
  update: (patch: Partial<ConvertForm>) => void;
  running: ActiveRun | null;
  onStart: () => void;
  onClearLog: () => void;
}

export function convertFields(ctx: ConvertFieldsContext): Field[] {
  const { form, update } = ctx;
  return [
    { kind: 'section', id: 'epub-source', label: 'Source' },
    {
      kind: 'note',
      id: 'epub-source-note',
      text: 'Point this to the folder where you saved your downloaded Markdown files.',
    },
    {
      kind: 'text',
      id: 'source-dir',
      label: 'Source folder',
      value: form.sourceDir,
      placeholder: 'Folder containing .md files…',
      onChange: sourceDir => update({ sourceDir }),
    },
    { kind: 'section', id: 'epub-output', label: 'Output' },
    {
      kind: 'text',
      id: 'output-file',
      label: 'Output file',
      value: form.outputFile,
      placeholder: 'Save ePub as…',
      onChange: outputFile => update({ outputFile }),
    },
    { kind: 'section', id: 'epub-metadata', label: 'Metadata' },
    {
      kind: 'text',
      id: 'title',
      label: 'Title',
      value: form.title,
      placeholder: 'e.g. My Substack Archive',
      onChange: title => update({ title }),
    },
    {
      kind: 'text',
      id: 'author',
      label: 'Author',
      value: form.author,
      placeholder: 'e.g. Jane Smith',
      onChange: author => update({ author }),
    },
    { kind: 'section', id: 'epub-options', label: 'Options' },
    {
      kind: 'toggle',
      id: 'toc',
      label: 'Include Table of Contents',
      value: form.toc,
      onChange: toc => update({ toc }),
    },
    {
      kind: 'text',
      id: 'split-level',
      label: 'Chapter split level (1 = each article is a chapter)',
      value: form.splitLevel,
      onChange: splitLevel => update({ splitLevel }),
    },
    actionButton('convert', ctx.running, ctx.onStart),
    { kind: 'button', id: 'convert-clear-log', label: 'Clear Log', busy: false, onPress: ctx.onClearLog },
  ];
}

const SETUP_GUIDE = [
  'Install sbstck-dl with:   pip install sbstck-dl',
  'It is usually found on the system PATH, so the path above can stay blank.',
  'If it is not found, enter the full path to the executable.',
  'Install pandoc from https://pandoc.org/installing.html.',
  'On Windows its default location is pre-filled; change it if you installed elsewhere.',
  'Choose Save Settings after changing either path.',
];

export interface SettingsFieldsContext {
  tools: ToolPaths;
  update: (patch: Partial<ToolPaths>) => void;
  saved: boolean;
  onSave: () => void;
  onClearLog: () => void;
}

export function settingsFields(ctx: SettingsFieldsContext): Field[] {
  const { tools, update } = ctx;
  return [
    { kind: 'section', id: 'tools', label: 'Tool Locations' },
    {
      kind: 'text',
      id: 'downloader-path',
      label: 'sbstck-dl executable',
      value: tools.downloaderPath,
      placeholder: 'Leave blank to use system PATH',
      onChange: downloaderPath => update({ downloaderPath }),
    },
    {
      kind: 'text',
      id: 'converter-path',
      label: 'pandoc executable',
      value: tools.converterPath,
      placeholder: 'Leave blank to use system PATH',
      onChange: converterPath => update({ converterPath }),
    },
    { kind: 'button', id: 'save-settings', label: ctx.saved ? 'Saved!' : 'Save Settings', busy: false, onPress: ctx.onSave },
    { kind: 'button', id: 'settings-clear-log', label: 'Clear Log', busy: false, onPress: ctx.onClearLog },
    { kind: 'section', id: 'setup', label: 'First-Time Setup' },
    ...SETUP_GUIDE.map((text, i): Field => ({ kind: 'note', id: `setup-${i}`, text })),
  ];
}
