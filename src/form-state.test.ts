import { describe, expect, it } from 'vitest';
import {
  applySessionState,
  applyToolPaths,
  initialConvertForm,
  initialDownloadForm,
  initialToolPaths,
} from './form-state.js';
import { defaultSettings } from './settings.js';

describe('form state', () => {
  const settings = {
    ...defaultSettings('linux'),
    last_url: 'https://x.substack.com',
    last_output_dir: '/tmp/archive',
    last_format: 'HTML (.html)',
    last_epub_source_dir: '/tmp/archive',
    last_author: 'A. Writer',
    sbstckdl_path: '/opt/bin/sbstck-dl',
  };

  it('restores the last session', () => {
    const download = initialDownloadForm(settings);
    expect(download.url).toBe('https://x.substack.com');
    expect(download.format).toBe('HTML (.html)');
    expect(download.addSourceUrl).toBe(true);
    expect(download.imageQuality).toBe('low');
    expect(download.rateLimit).toBe('1');
    expect(download.cookieName).toBe('substack.sid');
    expect(download.cookieValue).toBe('');

    const convert = initialConvertForm(settings);
    expect(convert).toEqual({
      sourceDir: '/tmp/archive',
      outputFile: '',
      title: '',
      author: 'A. Writer',
      toc: true,
      splitLevel: '1',
    });

    expect(initialToolPaths(settings)).toEqual({ downloaderPath: '/opt/bin/sbstck-dl', converterPath: '' });
  });

  it('trims tool paths before saving them', () => {
    const next = applyToolPaths(settings, { downloaderPath: '  ', converterPath: ' /usr/bin/pandoc ' });

    expect(next.sbstckdl_path).toBe('');
    expect(next.pandoc_path).toBe('/usr/bin/pandoc');
  });

  it('records the session without the cookie value', () => {
    const download = { ...initialDownloadForm(settings), url: 'https://y.substack.com', cookieValue: 'test-secret' };
    const convert = { ...initialConvertForm(settings), outputFile: '/tmp/archive/book.epub' };

    const next = applySessionState(settings, download, convert, '120x40');

    expect(next).toEqual({
      ...settings,
      window_geometry: '120x40',
      last_url: 'https://y.substack.com',
      last_epub_output_file: '/tmp/archive/book.epub',
    });
    expect(Object.values(next)).not.toContain('test-secret');
  });
});
