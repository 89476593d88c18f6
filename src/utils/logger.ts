import axios from 'axios';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown> | undefined;

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// errors stringify to {} so they are expanded; everything else goes to JSON as is
function serializeMeta(meta: LogMeta) {
  if (!meta) return {};
  const serialized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    serialized[key] = value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
  }
  return serialized;
}

function isLevelName(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel | 'silent' {
  const raw = (process.env.LOG_LEVEL || '').toLowerCase();
  return isLevelName(raw) ? raw : 'info';
}

let ingestionWebhook: string | null = null;
let baseMeta: Record<string, unknown> = {};
let minLevel: LogLevel | 'silent' = levelFromEnv();

function emit(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    msg,
    ...baseMeta,
    ...serializeMeta(meta),
  };
  const line = JSON.stringify(entry);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else if (level === 'debug') {
    console.debug(line);
  } else {
    console.log(line);
  }

  if (ingestionWebhook) {
    // shipping is best effort; a failed post is reported on stderr only
    axios.post(ingestionWebhook, entry, { timeout: 2000 }).catch((error: unknown) => {
      console.error(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level: 'error',
          msg: 'log_ingestion_failed',
          error: error instanceof Error ? error.message : String(error),
        })
      );
    });
  }
}

export const logger = {
  debug(msg: string, meta?: LogMeta) {
    emit('debug', msg, meta);
  },
  info(msg: string, meta?: LogMeta) {
    emit('info', msg, meta);
  },
  warn(msg: string, meta?: LogMeta) {
    emit('warn', msg, meta);
  },
  error(msg: string, meta?: LogMeta) {
    emit('error', msg, meta);
  },
};

export function setLogLevel(level: string) {
  const normalized = level.toLowerCase();
  if (!isLevelName(normalized)) {
    emit('warn', 'log_level_invalid', { event: 'log_level_invalid', level, kept: minLevel });
    return;
  }
  minLevel = normalized;
}

export function setLogIngestionWebhook(url: string | null) {
  ingestionWebhook = url;
}

export function setLogContext(meta: Record<string, unknown>) {
  baseMeta = { ...meta };
}

export function clearLogContext() {
  baseMeta = {};
}
