/**
 * Activity log for the vault server.
 *
 * Keeps the last MAX_ENTRIES records in memory for the `server_log` tool and
 * echoes each one to stderr; stdout is reserved for the stdio transport.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogComponent = 'server' | 'index' | 'ops' | 'config';

export const LOG_COMPONENTS: readonly LogComponent[] = ['server', 'index', 'ops', 'config'];

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const serverStartTs = Date.now();

export function serverLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  buffer.push({ ts: Date.now(), component, message, level });
  if (buffer.length > MAX_ENTRIES) {
    buffer.shift();
  }

  const tag = level === 'info' ? '' : ` ${level.toUpperCase()}`;
  console.error(`[mdvault]${tag} [${component}] ${message}`);
}

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

export interface LogQuery {
  /** Entries strictly after this epoch-ms timestamp */
  since?: number;
  component?: LogComponent;
  /** Lowest level to include; `warn` drops routine index and write notices */
  minLevel?: LogLevel;
  limit?: number;
}

export interface LogSnapshot {
  entries: LogEntry[];
  /** Matching entries before `limit` was applied */
  matched: number;
  server_uptime_ms: number;
}

/**
 * Filter the buffer, newest `limit` entries last
 */
export function getServerLog(query: LogQuery = {}): LogSnapshot {
  const { since, component, minLevel = 'info', limit = 100 } = query;
  const floor = LEVEL_RANK[minLevel];

  const matching = buffer.filter(e =>
    (since === undefined || e.ts > since) &&
    (component === undefined || e.component === component) &&
    LEVEL_RANK[e.level] >= floor
  );

  return {
    entries: matching.slice(-limit),
    matched: matching.length,
    server_uptime_ms: Date.now() - serverStartTs,
  };
}
