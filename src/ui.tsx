import { useState, useEffect, useRef, useMemo, useCallback } from 'react';
import { render, Box, Text, useInput, useApp, useStdout } from 'ink';
import TextInput from 'ink-text-input';
import Spinner from 'ink-spinner';
import { buildConvertCommand, buildDownloadCommand, formatCommand } from './command-builder.js';
import { completionDialog, type Dialog, type DialogAction, errorDialog } from './completion.js';
import {
  ACTION_LABELS,
  applyKey,
  convertFields,
  downloadFields,
  type Field,
  type FieldKey,
  moveFocus,
  resolveFocus,
  settingsFields,
  type Tab,
  TABS,
} from './fields.js';
import { openInFileManager } from './file-manager.js';
import {
  applySessionState,
  applyToolPaths,
  type ConvertForm,
  type DownloadForm,
  initialConvertForm,
  initialDownloadForm,
  initialToolPaths,
  type ToolPaths,
} from './form-state.js';
import { styleLogLine } from './log-colors.js';
import type { LogSink } from './log-sink.js';
import {
  ALREADY_RUNNING_WARNING,
  type ActiveRun,
  type FinishedEvent,
  type ProcessRunner,
} from './process-runner.js';
import { describeSourceFolder, formatConvertPreview } from './preview.js';
import { saveSettings, type Settings } from './settings.js';
import { validateConvert, validateDownload } from './validation.js';
import { errorMessage } from './errors.js';
import log from './logger.js';

const SAVED_FLASH_MS = 2000;
const LOG_PAGE = 10;

interface AppProps {
  settings: Settings;
  settingsPath: string;
  runner: ProcessRunner;
  sink: LogSink;
}

export function App({ settings, settingsPath, runner, sink }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();

  const settingsRef = useRef<Settings>(settings);
  const [tab, setTab] = useState<Tab>('download');
  const [focusIds, setFocusIds] = useState<Record<Tab, string>>({ download: '', convert: '', settings: '' });
  const [download, setDownload] = useState<DownloadForm>(() => initialDownloadForm(settings));
  const [convert, setConvert] = useState<ConvertForm>(() => initialConvertForm(settings));
  const [tools, setTools] = useState<ToolPaths>(() => initialToolPaths(settings));
  const [showCookies, setShowCookies] = useState(false);
  const [revealCookie, setRevealCookie] = useState(false);
  const [running, setRunning] = useState<ActiveRun | null>(runner.getActiveRun());
  const [dialog, setDialog] = useState<Dialog | null>(null);
  const [dialogIndex, setDialogIndex] = useState(0);
  const [saved, setSaved] = useState(false);
  const [logs, setLogs] = useState<string[]>(() => sink.lines());
  const [logScrollOffset, setLogScrollOffset] = useState(Infinity);

  // Completion handlers read the forms as they are when the run ends.
  const downloadRef = useRef(download);
  const convertRef = useRef(convert);
  downloadRef.current = download;
  convertRef.current = convert;

  useEffect(() => {
    sink.start(() => setLogs(sink.lines()));
    return () => sink.stop();
  }, [sink]);

  useEffect(() => {
    const onStateChange = () => setRunning(runner.getActiveRun());
    const onFinished = (event: FinishedEvent) => {
      const next = completionDialog(event, downloadRef.current, convertRef.current);
      if (next) {
        setDialogIndex(0);
        setDialog(next);
      }
    };

    runner.on('state-change', onStateChange);
    runner.on('finished', onFinished);

    return () => {
      runner.off('state-change', onStateChange);
      runner.off('finished', onFinished);
    };
  }, [runner]);

  useEffect(() => {
    if (!saved) return;
    const timeout = setTimeout(() => setSaved(false), SAVED_FLASH_MS);
    return () => clearTimeout(timeout);
  }, [saved]);

  const showDialog = useCallback((next: Dialog) => {
    setDialogIndex(0);
    setDialog(next);
  }, []);

  const clearLog = useCallback(() => {
    sink.clear();
    setLogs([]);
    setLogScrollOffset(Infinity);
  }, [sink]);

  const startDownload = () => {
    if (runner.isRunning()) {
      sink.write(ALREADY_RUNNING_WARNING);
      return;
    }
    const err = validateDownload(download);
    if (err) {
      showDialog(errorDialog('Validation Error', err));
      return;
    }
    runner.start({ operation: 'download', argv: buildDownloadCommand(download, tools), ...ACTION_LABELS.download });
  };

  const startConvert = () => {
    if (runner.isRunning()) {
      sink.write(ALREADY_RUNNING_WARNING);
      return;
    }
    const err = validateConvert(convert);
    if (err) {
      showDialog(errorDialog('Validation Error', err));
      return;
    }
    const argv = buildConvertCommand(convert, tools);
    if (argv === null) {
      showDialog(errorDialog('Error', 'Could not build pandoc command.'));
      return;
    }
    runner.start({ operation: 'convert', argv, ...ACTION_LABELS.convert });
  };

  const saveToolSettings = () => {
    const next = applyToolPaths(settingsRef.current, tools);
    settingsRef.current = next;
    const err = saveSettings(next, settingsPath);
    if (err) {
      showDialog(errorDialog('Config Error', err));
      return;
    }
    sink.write('[Settings saved]\n');
    setSaved(true);
  };

  const quit = () => {
    const geometry = `${stdout.columns || 80}x${stdout.rows || 24}`;
    settingsRef.current = applySessionState(settingsRef.current, download, convert, geometry);
    const err = saveSettings(settingsRef.current, settingsPath);
    sink.stop();
    exit(err ? new Error(err) : undefined);
  };

  const runDialogAction = (action: DialogAction) => {
    setDialog(null);
    switch (action.kind) {
      case 'create-epub':
        setConvert(prev => ({ ...prev, sourceDir: action.sourceDir, outputFile: action.outputFile }));
        setTab('convert');
        break;
      case 'open-folder':
        openInFileManager(action.path).then(
          message => {
            if (message) showDialog(errorDialog('Error', message));
          },
          (err: unknown) => log.error(`Opening ${action.path} failed: ${errorMessage(err)}`),
        );
        break;
      case 'dismiss':
        break;
    }
  };

  const buildFields = (): Field[] => {
    switch (tab) {
      case 'download':
        return downloadFields({
          form: download,
          update: patch => setDownload(prev => ({ ...prev, ...patch })),
          showCookies,
          setShowCookies,
          revealCookie,
          setRevealCookie,
          running,
          onStart: startDownload,
          onClearLog: clearLog,
        });
      case 'convert':
        return convertFields({
          form: convert,
          update: patch => setConvert(prev => ({ ...prev, ...patch })),
          running,
          onStart: startConvert,
          onClearLog: clearLog,
        });
      case 'settings':
        return settingsFields({
          tools,
          update: patch => setTools(prev => ({ ...prev, ...patch })),
          saved,
          onSave: saveToolSettings,
          onClearLog: clearLog,
        });
    }
  };

  const fields = buildFields();

  const focused = resolveFocus(fields, focusIds[tab]);
  const focusId = focused?.id ?? '';

  const setFocus = (id: string) => setFocusIds(prev => ({ ...prev, [tab]: id }));

  const terminalWidth = stdout.columns || 80;
  const terminalHeight = stdout.rows || 24;
  const contentHeight = terminalHeight - 2;
  const formHeight = Math.max(8, Math.floor(contentHeight * 0.5));
  const logHeight = Math.max(3, contentHeight - formHeight);
  const logDisplayHeight = logHeight - 1;

  const scrollLog = (delta: number) => {
    setLogScrollOffset(prev => {
      const maxScroll = Math.max(0, logs.length - logDisplayHeight);
      const current = prev === Infinity ? maxScroll : prev;
      const next = Math.max(0, Math.min(current + delta, maxScroll));
      return next >= maxScroll ? Infinity : next;
    });
  };

  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      quit();
      return;
    }

    if (dialog) {
      if (key.leftArrow) {
        setDialogIndex(prev => Math.max(0, prev - 1));
      } else if (key.rightArrow) {
        setDialogIndex(prev => Math.min(dialog.actions.length - 1, prev + 1));
      } else if (key.return) {
        runDialogAction(dialog.actions[Math.min(dialogIndex, dialog.actions.length - 1)]);
      } else if (key.escape) {
        setDialog(null);
      }
      return;
    }

    if (key.tab) {
      const index = TABS.findIndex(t => t.id === tab);
      const delta = key.shift ? -1 : 1;
      setTab(TABS[(index + delta + TABS.length) % TABS.length].id);
    } else if (key.upArrow) {
      setFocus(moveFocus(fields, focusId, -1));
    } else if (key.downArrow) {
      setFocus(moveFocus(fields, focusId, 1));
    } else if (key.pageUp) {
      scrollLog(-LOG_PAGE);
    } else if (key.pageDown) {
      scrollLog(LOG_PAGE);
    } else if (key.escape) {
      setLogScrollOffset(Infinity);
    } else if (focused && focused.kind !== 'text') {
      let fieldKey: FieldKey | null = null;
      if (key.leftArrow) fieldKey = 'left';
      else if (key.rightArrow) fieldKey = 'right';
      else if (key.return) fieldKey = 'enter';
      else if (input === ' ') fieldKey = 'space';
      if (fieldKey) {
        applyKey(focused, fieldKey);
      }
    }
  });

  const helpText = dialog
    ? '←→: choose | Enter: confirm | Esc: close'
    : 'Tab: switch tab | ↑↓: move | Enter/Space/←→: change | PgUp/PgDn: scroll log | Esc: follow log | Ctrl+C: save & quit';

  return (
    <Box flexDirection="column" width={terminalWidth} height={terminalHeight}>
      <TabBar width={terminalWidth} tab={tab} running={running} />
      <Box flexDirection="row" width={terminalWidth} height={formHeight}>
        <FormPane
          width={Math.floor(terminalWidth * 0.55)}
          height={formHeight}
          fields={fields}
          focusId={focusId}
          inputActive={dialog === null}
          onSubmitText={() => setFocus(moveFocus(fields, focusId, 1))}
        />
        <Separator height={formHeight} />
        <PreviewPane
          width={terminalWidth - Math.floor(terminalWidth * 0.55) - 1}
          height={formHeight}
          tab={tab}
          download={download}
          convert={convert}
          tools={tools}
          settingsPath={settingsPath}
        />
      </Box>
      {dialog ? (
        <DialogBox width={terminalWidth} height={logHeight} dialog={dialog} selected={dialogIndex} />
      ) : (
        <LogPane width={terminalWidth} height={logHeight} logs={logs} logScrollOffset={logScrollOffset} />
      )}
      <Box width={terminalWidth} height={1}>
        <Text backgroundColor="#585858" color="#ffffff">
          {helpText.substring(0, terminalWidth).padEnd(terminalWidth)}
        </Text>
      </Box>
    </Box>
  );
}

function TabBar({ width, tab, running }: { width: number; tab: Tab; running: ActiveRun | null }) {
  return (
    <Box width={width} height={1}>
      {TABS.map(t => (
        <Text key={t.id} backgroundColor={t.id === tab ? '#0055ff' : '#585858'} color="#ffffff" bold={t.id === tab}>
          {` ${t.title} `}
        </Text>
      ))}
      <Box flexGrow={1} />
      {running && (
        <Text color="#ffaa00">
          <Spinner type="dots" /> {running.runningLabel}
        </Text>
      )}
    </Box>
  );
}

function Separator({ height }: { height: number }) {
  return (
    <Box flexDirection="column" width={1} height={height}>
      {Array.from({ length: height }, (_, i) => (
        <Text key={i} color="#585858">│</Text>
      ))}
    </Box>
  );
}

interface FormPaneProps {
  width: number;
  height: number;
  fields: Field[];
  focusId: string;
  inputActive: boolean;
  onSubmitText: () => void;
}

function FormPane({ width, height, fields, focusId, inputActive, onSubmitText }: FormPaneProps) {
  const focusedIndex = Math.max(0, fields.findIndex(field => field.id === focusId));
  let start = 0;
  if (focusedIndex >= height) {
    start = focusedIndex - height + 1;
  }
  const visible = fields.slice(start, start + height);

  return (
    <Box flexDirection="column" width={width} height={height} overflow="hidden">
      {visible.map(field => (
        <FieldRow
          key={field.id}
          width={width}
          field={field}
          focused={field.id === focusId}
          inputActive={inputActive}
          onSubmitText={onSubmitText}
        />
      ))}
    </Box>
  );
}

interface FieldRowProps {
  width: number;
  field: Field;
  focused: boolean;
  inputActive: boolean;
  onSubmitText: () => void;
}

function FieldRow({ width, field, focused, inputActive, onSubmitText }: FieldRowProps) {
  const marker = focused ? '▶ ' : '  ';
  const color = focused ? '#ffffff' : '#d7d7d7';

  switch (field.kind) {
    case 'section':
      return (
        <Box width={width} height={1}>
          <Text bold color="#55ffff">{field.label.substring(0, width)}</Text>
        </Box>
      );
    case 'note':
      return (
        <Box width={width} height={1}>
          <Text dimColor>{`  ${field.text}`.substring(0, width)}</Text>
        </Box>
      );
    case 'text':
      return (
        <Box width={width} height={1} overflow="hidden">
          <Text color={color} bold={focused}>{`${marker}${field.label}: `}</Text>
          {focused && inputActive ? (
            <TextInput
              value={field.value}
              onChange={field.onChange}
              onSubmit={onSubmitText}
              placeholder={field.placeholder}
              mask={field.mask ? '*' : undefined}
              focus
            />
          ) : field.value ? (
            <Text color={color}>{field.mask ? '*'.repeat(field.value.length) : field.value}</Text>
          ) : (
            <Text dimColor>{field.placeholder ?? ''}</Text>
          )}
        </Box>
      );
    case 'toggle':
      return (
        <Box width={width} height={1}>
          <Text color={color} bold={focused}>
            {`${marker}[${field.value ? 'x' : ' '}] ${field.label}`.substring(0, width)}
          </Text>
        </Box>
      );
    case 'select':
      return (
        <Box width={width} height={1}>
          <Text color={color} bold={focused}>{`${marker}${field.label}: `}</Text>
          <Text color={focused ? '#55ffff' : color}>{`‹ ${field.value} ›`}</Text>
        </Box>
      );
    case 'button':
      return (
        <Box width={width} height={1}>
          <Text>{marker}</Text>
          <Text backgroundColor={focused ? '#0055ff' : '#3a3a3a'} color="#ffffff" bold={focused}>
            {` ${field.label} `}
          </Text>
          {field.busy && (
            <Text color="#ffaa00">
              {' '}
              <Spinner type="dots" />
            </Text>
          )}
        </Box>
      );
  }
}

interface PreviewPaneProps {
  width: number;
  height: number;
  tab: Tab;
  download: DownloadForm;
  convert: ConvertForm;
  tools: ToolPaths;
  settingsPath: string;
}

function PreviewPane({ width, height, tab, download, convert, tools, settingsPath }: PreviewPaneProps) {
  const downloadPreview = useMemo(() => formatCommand(buildDownloadCommand(download, tools)), [download, tools]);
  const convertPreview = useMemo(
    () => formatConvertPreview(buildConvertCommand(convert, tools), convert, tools),
    [convert, tools],
  );
  const folderPreview = useMemo(() => describeSourceFolder(convert.sourceDir), [convert.sourceDir]);

  return (
    <Box flexDirection="column" width={width} height={height} overflow="hidden" paddingLeft={1}>
      {tab === 'download' && (
        <>
          <Text bold color="#55ffff">Command preview</Text>
          <Text wrap="wrap">{downloadPreview}</Text>
        </>
      )}
      {tab === 'convert' && (
        <>
          <Text bold color="#55ffff">Files</Text>
          <Text wrap="truncate-end">{folderPreview}</Text>
          <Text bold color="#55ffff">Command preview</Text>
          <Text wrap="wrap">{convertPreview}</Text>
        </>
      )}
      {tab === 'settings' && (
        <>
          <Text bold color="#55ffff">Settings file</Text>
          <Text wrap="wrap">{settingsPath}</Text>
          <Text dimColor>The cookie value is never saved.</Text>
        </>
      )}
    </Box>
  );
}

interface LogPaneProps {
  width: number;
  height: number;
  logs: string[];
  logScrollOffset: number;
}

function LogPane({ width, height, logs, logScrollOffset }: LogPaneProps) {
  const displayHeight = height - 1;
  const following = logScrollOffset === Infinity;
  const startIndex = following
    ? Math.max(0, logs.length - displayHeight)
    : Math.min(logScrollOffset, Math.max(0, logs.length - displayHeight));
  const displayLogs = logs.slice(startIndex, startIndex + displayHeight);
  const title = following ? ' Output Log ' : ' Output Log (scrolled, Esc to follow) ';

  return (
    <Box flexDirection="column" width={width} height={height}>
      <Box width={width} height={1}>
        <Text backgroundColor="#585858" color="#ffffff" bold>
          {title.padEnd(width)}
        </Text>
      </Box>
      <Box flexDirection="column" width={width} height={displayHeight}>
        {displayLogs.map((line, i) => {
          const styled = styleLogLine(line);
          return (
            <Text key={startIndex + i} color={styled.color}>
              {styled.text.substring(0, width).padEnd(width)}
            </Text>
          );
        })}
      </Box>
    </Box>
  );
}

interface DialogBoxProps {
  width: number;
  height: number;
  dialog: Dialog;
  selected: number;
}

function DialogBox({ width, height, dialog, selected }: DialogBoxProps) {
  const borderColor = dialog.tone === 'error' ? '#ff5555' : dialog.tone === 'info' ? '#55ffff' : '#00ff00';
  const icon = dialog.tone === 'error' ? '✗' : dialog.tone === 'info' ? '•' : '✓';

  return (
    <Box width={width} height={height} justifyContent="center" alignItems="center">
      <Box
        flexDirection="column"
        width={Math.min(64, width - 4)}
        borderStyle="round"
        borderColor={borderColor}
        paddingX={2}
      >
        <Text dimColor>{dialog.title}</Text>
        <Text bold color={borderColor}>{`${icon}  ${dialog.heading}`}</Text>
        <Box marginY={1}>
          <Text wrap="wrap">{dialog.detail}</Text>
        </Box>
        <Box>
          {dialog.actions.map((action, i) => (
            <Box key={action.label} marginRight={2}>
              <Text backgroundColor={i === selected ? '#0055ff' : '#3a3a3a'} color="#ffffff" bold={i === selected}>
                {` ${action.label} `}
              </Text>
            </Box>
          ))}
        </Box>
      </Box>
    </Box>
  );
}

export function renderApp(settings: Settings, settingsPath: string, runner: ProcessRunner, sink: LogSink) {
  // Runs after Ink exits and waits for a running child to stop.
  const cleanup = () => {
    sink.stop();
    return runner.dispose();
  };

  const { waitUntilExit, unmount } = render(
    <App settings={settings} settingsPath={settingsPath} runner={runner} sink={sink} />,
    { exitOnCtrlC: false },
  );

  process.once('SIGTERM', () => unmount());

  return waitUntilExit().finally(cleanup);
}
