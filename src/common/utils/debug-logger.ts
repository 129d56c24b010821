/**
 * Flow logger for the ingestion pipeline.
 *
 * Color-coded, emoji-tagged lines with correlation ids and timings, so one
 * chat event can be followed from the HTTP edge to the store.
 *
 * Visual Language:
 *   📥 RECV     - Incoming chat/message event
 *   📤 SEND     - Response returned to the messaging client
 *   💾 STATE    - Store writes and cache changes
 *   ⚡ PERF     - Performance timing
 *   ✅ OK       - Success
 *   ❌ ERR      - Error
 */

// ANSI color codes for terminal
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
};

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface DebugConfig {
  enabled: boolean;
  minLevel: LogLevel;
  showTimestamp: boolean;
  showCorrelationId: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function parseLevel(value: string | undefined): LogLevel {
  return value === 'info' || value === 'warn' || value === 'error'
    ? value
    : 'debug';
}

// Configuration from environment
const config: DebugConfig = {
  enabled: process.env.DEBUG_LOGS !== '0' && process.env.NODE_ENV !== 'test',
  minLevel: parseLevel(process.env.DEBUG_LEVEL),
  showTimestamp: process.env.DEBUG_TIMESTAMP !== '0',
  showCorrelationId: true,
};

/**
 * Format a value for display (truncate if too long)
 */
function formatValue(value: unknown, maxLen = 80): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') {
    const clean = value.replace(/\n/g, '↵').trim();
    return clean.length > maxLen ? clean.substring(0, maxLen) + '…' : clean;
  }
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > maxLen ? str.substring(0, maxLen) + '…' : str;
  }
  return String(value);
}

/**
 * Format milliseconds duration
 */
function formatMs(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Get timestamp string
 */
function timestamp(): string {
  if (!config.showTimestamp) return '';
  const now = new Date();
  const time = now.toTimeString().split(' ')[0];
  const ms = now.getMilliseconds().toString().padStart(3, '0');
  return `${colors.dim}${time}.${ms}${colors.reset} `;
}

/**
 * Format correlation ID
 */
function formatCid(cid?: string): string {
  if (!config.showCorrelationId || !cid) return '';
  return `${colors.dim}[${cid}]${colors.reset} `;
}

/**
 * Main debug logger class
 */
class DebugLogger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  private shouldLog(level: LogLevel): boolean {
    if (!config.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[config.minLevel];
  }

  private log(
    level: LogLevel,
    emoji: string,
    tag: string,
    message: string,
    data?: Record<string, unknown>,
    cid?: string,
  ) {
    if (!this.shouldLog(level)) return;

    const tagColors: Record<string, string> = {
      RECV: colors.cyan,
      SEND: colors.green,
      STATE: colors.dim,
      PERF: colors.bright,
      OK: colors.green,
      ERR: colors.red,
    };

    const tagColor = tagColors[tag] || colors.white;
    const paddedTag = tag.padEnd(7);

    let line = `${timestamp()}${formatCid(cid)}${emoji} ${tagColor}${paddedTag}${colors.reset} ${colors.dim}${this.context}${colors.reset} ${message}`;

    if (data && Object.keys(data).length > 0) {
      const dataStr = Object.entries(data)
        .map(([k, v]) => `${colors.dim}${k}=${colors.reset}${formatValue(v)}`)
        .join(' ');
      line += ` ${dataStr}`;
    }

    console.log(line);
  }

  // =========== Flow Events ===========

  /** Incoming message received */
  recv(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '📥', 'RECV', message, data, cid);
  }

  /** Outgoing response sent */
  send(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '📤', 'SEND', message, data, cid);
  }

  /** Store write or cache change */
  state(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('debug', '💾', 'STATE', message, data, cid);
  }

  /** Performance timing */
  perf(message: string, ms: number, cid?: string) {
    const formatted = formatMs(ms);
    const color =
      ms < 100 ? colors.green : ms < 500 ? colors.yellow : colors.red;
    const time = `${color}${formatted}${colors.reset}`;
    this.log('info', '⚡', 'PERF', message, { time }, cid);
  }

  /** Success */
  ok(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '✅', 'OK', message, data, cid);
  }

  /** Error */
  err(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('error', '❌', 'ERR', message, data, cid);
  }

  // =========== Utility Methods ===========

  /** Start a timer and return a function to log the elapsed time */
  timer(label: string, cid?: string): () => void {
    const start = Date.now();
    return () => {
      this.perf(label, Date.now() - start, cid);
    };
  }
}

/**
 * Create a debug logger for a specific context
 */
function createDebugLogger(context: string): DebugLogger {
  return new DebugLogger(context);
}

/**
 * Singleton loggers for common contexts
 */
export const debugLog = {
  ingest: createDebugLogger('ingest'),
};

