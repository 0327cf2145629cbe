import path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

type ExtraInformation = Record<string, unknown>;

/**
 * Extracts caller information from the call stack
 * @param depth How deep in the call stack to look (2 = caller of caller)
 */
function getCallerInfo(depth: number = 2): { fileName: string; functionName: string } {
  const originalPrepareStackTrace = Error.prepareStackTrace;
  let frames: NodeJS.CallSite[] = [];

  try {
    Error.prepareStackTrace = (_, stack) => {
      frames = stack;
      return '';
    };
    // Reading the stack runs prepareStackTrace
    void new Error().stack;
  } finally {
    Error.prepareStackTrace = originalPrepareStackTrace;
  }

  if (frames.length > depth) {
    const caller = frames[depth];
    const fileName = caller.getFileName();
    return {
      fileName: fileName ? path.basename(fileName).replace(/\.(test\.)?[cm]?[jt]s$/, '') : 'unknown',
      functionName: caller.getFunctionName() || 'anonymous',
    };
  }

  return {
    fileName: 'unknown',
    functionName: 'unknown',
  };
}

function isExtraInformation(value: unknown): value is ExtraInformation {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Error) {
    return value.message;
  }
  return JSON.stringify(value);
}

function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join(' | ');
}

/**
 * Main logging function
 * @param level Log level
 * @param args Message parts and optional extraInformation
 */
function logMessage(level: LogLevel, ...args: unknown[]): void {
  const { fileName, functionName } = getCallerInfo(3); // 3 because we go through helper methods

  // A trailing plain object is extra information, not part of the message
  let extraInformation: ExtraInformation | undefined;
  let messageParts = args;
  const lastArg = args[args.length - 1];
  if (isExtraInformation(lastArg)) {
    extraInformation = lastArg;
    messageParts = args.slice(0, -1);
  }

  const parts: string[] = [level];
  parts.push(`${fileName}:${functionName}`);
  parts.push(messageParts.map(formatValue).join(' '));
  if (extraInformation) {
    parts.push(formatExtraInformation(extraInformation));
  }

  const fullOutput = parts.join(' | ');

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(fullOutput);
      break;
    case LogLevel.LOG:
      console.log(fullOutput);
      break;
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
  }
}

/**
 * Debug level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Read', 12, 'rows', { table: 'Expenses' })
 */
export function debug(...args: unknown[]): void {
  logMessage(LogLevel.DEBUG, ...args);
}

/**
 * Info level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Server is running', { port: 5002 })
 */
export function log(...args: unknown[]): void {
  logMessage(LogLevel.LOG, ...args);
}

/**
 * Warning level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Dropped', 2, 'rows', { table: 'Expenses' })
 */
export function warn(...args: unknown[]): void {
  logMessage(LogLevel.WARN, ...args);
}

/**
 * Error level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Append failed', { table: 'Income' })
 */
export function err(...args: unknown[]): void {
  logMessage(LogLevel.ERROR, ...args);
}
