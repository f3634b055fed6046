/**
 * Flow logger for the dispatch engine.
 *
 * One line per step of an inbound event, tagged and colour-coded so a whole
 * conversation turn can be followed by its correlation id:
 *
 *   📥 RECV   - inbound event decoded
 *   🧭 ROUTE  - router decision
 *   📤 SEND   - outbound call to the transport
 *   ⏰ DELAY  - follow-up scheduled, fired or cancelled
 *   💾 STATE  - conversation state / storage change
 *   ⚡ PERF   - timing
 *   ✅ OK     - step finished
 *   ❌ ERR    - failure (logged, never rethrown to the webhook)
 *   ⚠️  WARN   - recoverable problem
 */

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface DebugConfig {
  enabled: boolean;
  minLevel: LogLevel;
  showTimestamp: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env.DEBUG_LEVEL;

const config: DebugConfig = {
  enabled: process.env.DEBUG_LOGS !== '0',
  minLevel: isLogLevel(envLevel) ? envLevel : 'debug',
  showTimestamp: process.env.DEBUG_TIMESTAMP !== '0',
};

const TAG_COLORS: Record<string, string> = {
  RECV: colors.cyan,
  ROUTE: colors.magenta,
  SEND: colors.green,
  DELAY: colors.blue,
  STATE: colors.dim,
  PERF: colors.bright,
  OK: colors.green,
  ERR: colors.red,
  WARN: colors.yellow,
};

/**
 * Truncates long values so a log line stays on one row.
 */
export function formatValue(value: unknown, maxLen = 80): string {
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

export function formatMs(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function timestamp(): string {
  if (!config.showTimestamp) return '';
  const now = new Date();
  const time = now.toTimeString().split(' ')[0];
  const ms = now.getMilliseconds().toString().padStart(3, '0');
  return `${colors.dim}${time}.${ms}${colors.reset} `;
}

function formatCid(cid?: string): string {
  return cid ? `${colors.dim}[${cid}]${colors.reset} ` : '';
}

type LogData = Record<string, unknown>;

class DebugLogger {
  constructor(private readonly context: string) {}

  private shouldLog(level: LogLevel): boolean {
    if (!config.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[config.minLevel];
  }

  private write(
    level: LogLevel,
    emoji: string,
    tag: string,
    message: string,
    data?: LogData,
    cid?: string,
  ) {
    if (!this.shouldLog(level)) return;

    const tagColor = TAG_COLORS[tag] ?? colors.white;
    let line = `${timestamp()}${formatCid(cid)}${emoji} ${tagColor}${tag.padEnd(6)}${colors.reset} ${colors.dim}${this.context}${colors.reset} ${message}`;

    if (data && Object.keys(data).length > 0) {
      line +=
        ' ' +
        Object.entries(data)
          .map(([k, v]) => `${colors.dim}${k}=${colors.reset}${formatValue(v)}`)
          .join(' ');
    }

    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  recv(message: string, data?: LogData, cid?: string) {
    this.write('info', '📥', 'RECV', message, data, cid);
  }

  route(message: string, data?: LogData, cid?: string) {
    this.write('info', '🧭', 'ROUTE', message, data, cid);
  }

  send(message: string, data?: LogData, cid?: string) {
    this.write('info', '📤', 'SEND', message, data, cid);
  }

  delay(message: string, data?: LogData, cid?: string) {
    this.write('info', '⏰', 'DELAY', message, data, cid);
  }

  state(message: string, data?: LogData, cid?: string) {
    this.write('debug', '💾', 'STATE', message, data, cid);
  }

  perf(message: string, ms: number, cid?: string) {
    const color = ms < 100 ? colors.green : ms < 500 ? colors.yellow : colors.red;
    this.write('info', '⚡', 'PERF', message, { time: `${color}${formatMs(ms)}${colors.reset}` }, cid);
  }

  ok(message: string, data?: LogData, cid?: string) {
    this.write('info', '✅', 'OK', message, data, cid);
  }

  err(message: string, data?: LogData, cid?: string) {
    this.write('error', '❌', 'ERR', message, data, cid);
  }

  warn(message: string, data?: LogData, cid?: string) {
    this.write('warn', '⚠️ ', 'WARN', message, data, cid);
  }

  separator(cid?: string) {
    if (!this.shouldLog('debug')) return;
    console.log(`${timestamp()}${formatCid(cid)}${colors.dim}${'─'.repeat(60)}${colors.reset}`);
  }

  /** Returns a function that logs the time elapsed since this call. */
  timer(label: string, cid?: string): () => void {
    const start = Date.now();
    return () => {
      this.perf(label, Date.now() - start, cid);
    };
  }
}

export function createDebugLogger(context: string): DebugLogger {
  return new DebugLogger(context);
}

export const debugLog = {
  bot: createDebugLogger('bot'),
  router: createDebugLogger('router'),
  delivery: createDebugLogger('delivery'),
  scheduler: createDebugLogger('scheduler'),
};
