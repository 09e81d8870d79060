import type { Settings } from './settings.js';

export type Operation = 'download' | 'convert';

export const IMAGE_QUALITIES = ['low', 'medium', 'high'] as const;
export type ImageQuality = (typeof IMAGE_QUALITIES)[number];

export const DEFAULT_IMAGES_DIR = 'images';
export const DEFAULT_FILES_DIR = 'files';
export const DEFAULT_RATE = '1';
export const DEFAULT_COOKIE_NAME = 'substack.sid';

export interface DownloadForm {
  url: string;
  outputDir: string;
  format: string;
  datesEnabled: boolean;
  afterDate: string;
  beforeDate: string;
  downloadImages: boolean;
  imageQuality: ImageQuality;
  imagesDir: string;
  downloadFiles: boolean;
  fileExtensions: string;
  filesDir: string;
  addSourceUrl: boolean;
  createArchive: boolean;
  rateLimit: string;
  verbose: boolean;
  dryRun: boolean;
  cookieName: string;
  cookieValue: string;
}

export interface ConvertForm {
  sourceDir: string;
  outputFile: string;
  title: string;
  author: string;
  toc: boolean;
  splitLevel: string;
}

export interface ToolPaths {
  downloaderPath: string;
  converterPath: string;
}

export function initialDownloadForm(settings: Settings): DownloadForm {
  return {
    url: settings.last_url,
    outputDir: settings.last_output_dir,
    format: settings.last_format,
    datesEnabled: false,
    afterDate: '',
    beforeDate: '',
    downloadImages: false,
    imageQuality: 'low',
    imagesDir: DEFAULT_IMAGES_DIR,
    downloadFiles: false,
    fileExtensions: '',
    filesDir: DEFAULT_FILES_DIR,
    addSourceUrl: true,
    createArchive: false,
    rateLimit: DEFAULT_RATE,
    verbose: false,
    dryRun: false,
    cookieName: DEFAULT_COOKIE_NAME,
    cookieValue: '',
  };
}

export function initialConvertForm(settings: Settings): ConvertForm {
  return {
    sourceDir: settings.last_epub_source_dir,
    outputFile: settings.last_epub_output_file,
    title: '',
    author: settings.last_author,
    toc: true,
    splitLevel: '1',
  };
}

export function initialToolPaths(settings: Settings): ToolPaths {
  return {
    downloaderPath: settings.sbstckdl_path,
    converterPath: settings.pandoc_path,
  };
}

export function applyToolPaths(settings: Settings, tools: ToolPaths): Settings {
  return {
    ...settings,
    sbstckdl_path: tools.downloaderPath.trim(),
    pandoc_path: tools.converterPath.trim(),
  };
}

/** Session values written back at shutdown. The cookie value is never written. */
export function applySessionState(
  settings: Settings,
  download: DownloadForm,
  convert: ConvertForm,
  geometry: string,
): Settings {
  return {
    ...settings,
    window_geometry: geometry,
    last_url: download.url,
    last_output_dir: download.outputDir,
    last_format: download.format,
    last_epub_source_dir: convert.sourceDir,
    last_epub_output_file: convert.outputFile,
    last_author: convert.author,
  };
}
