type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = '[ruleweaver]';

function resolveThreshold(): number {
  const raw = (process.env.RULEWEAVER_LOG_LEVEL ?? 'info').trim().toLowerCase();
  if (raw === 'warning') return LEVEL_ORDER.warn;
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') {
    return LEVEL_ORDER[raw];
  }
  return LEVEL_ORDER.info;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < resolveThreshold()) return;
  // IMPORTANT: stdout carries `--json` output and the MCP stdio stream.
  // Keep all logs on stderr so neither gets corrupted.
  const logger = level === 'warn' ? console.warn : console.error;
  const line = `${PREFIX} ${message}`;
  if (context && Object.keys(context).length > 0) {
    logger(line, context);
    return;
  }
  logger(line);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
