import log from 'electron-log';

// Ink owns stdout, so the console transport stays off for the whole run.
log.transports.console.level = false;
log.transports.file.level = false;

export function configureLogger(file: string): void {
  log.transports.file.resolvePathFn = () => file;
  log.transports.file.level = 'info';
}

export default log;
