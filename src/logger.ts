type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function minimumLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').toUpperCase();
  return raw === 'DEBUG' || raw === 'WARN' || raw === 'ERROR' ? raw : 'INFO';
}

function timestamp(): string {
  return new Date().toISOString();
}

function log(level: LogLevel, module: string, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;

  const prefix = `[${timestamp()}] [${level}] [${module}]`;
  const write = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
  if (data !== undefined) {
    write(`${prefix} ${message}`, data);
  } else {
    write(`${prefix} ${message}`);
  }
}

export function createLogger(module: string) {
  return {
    info: (msg: string, data?: unknown) => log('INFO', module, msg, data),
    warn: (msg: string, data?: unknown) => log('WARN', module, msg, data),
    error: (msg: string, data?: unknown) => log('ERROR', module, msg, data),
    debug: (msg: string, data?: unknown) => log('DEBUG', module, msg, data),
  };
}
