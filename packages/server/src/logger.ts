export type LogLevel = 'info' | 'warn' | 'error';

type Threshold = LogLevel | 'silent';
type Fields = Record<string, unknown>;

const RANK: Record<Threshold, number> = { info: 0, warn: 1, error: 2, silent: 3 };

const SINKS: Record<LogLevel, (line: string) => void> = {
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
};

let threshold: Threshold = 'info';

/** Drops entries below `level`; `silent` drops everything. */
export function setLogLevel(level: Threshold) {
  threshold = level;
}

function write(level: LogLevel, event: string, fields: Fields = {}) {
  if (RANK[level] < RANK[threshold]) return;
  SINKS[level](JSON.stringify({ level, event, timestamp: new Date().toISOString(), ...fields }));
}

/** One JSON line per event, named `area.action`. */
export const logger = {
  info: (event: string, fields?: Fields) => write('info', event, fields),
  warn: (event: string, fields?: Fields) => write('warn', event, fields),
  error: (event: string, error: Error, fields?: Fields) =>
    write('error', event, { ...fields, error: error.message, stack: error.stack }),
};
