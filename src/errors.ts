export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** True when a spawn failed because the executable could not be found. */
export function isMissingExecutable(err: unknown): boolean {
  return isErrnoException(err) && err.code === 'ENOENT';
}
