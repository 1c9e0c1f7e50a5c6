type Level = 'debug' | 'info' | 'warn' | 'error';

const ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: Level = process.env.LOG_LEVEL === 'debug' ? 'debug' : 'info';

export function setLogLevel(level: Level) {
  threshold = level;
}

function write(level: Level, message: string) {
  if (ORDER[level] < ORDER[threshold]) return;
  const line = `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}`;
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export const logger = {
  debug: (message: string) => write('debug', message),
  info: (message: string) => write('info', message),
  warn: (message: string) => write('warn', message),
  error: (message: string) => write('error', message),
};
