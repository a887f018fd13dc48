import { AclError } from '../src/core/errors.js';
import type { LogContext, Logger } from '../src/utils/logger.js';

/** Run fn and return the AclError it throws. */
export function catchAclError(fn: () => unknown): AclError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AclError) return err;
    throw err;
  }
  throw new Error('expected an AclError');
}

export interface LogRecord {
  level: keyof Logger;
  message: string;
  context?: LogContext;
}

export function recordingLogger(): Logger & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  const at = (level: keyof Logger) => (message: string, context?: LogContext) => {
    records.push({ level, message, context });
  };
  return { records, debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}

/** Strip ANSI escape codes from a string */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/[\u001b\u009b][[()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g, '');
}
