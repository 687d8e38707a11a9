import { APP_CONFIG } from './config';
import { LogLevel } from '../types/forum';

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** One JSON line. `operation`/`code` are set only for rejected forum operations. */
export interface LogLine {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  operation?: string;
  code?: string;
  fields?: Record<string, unknown>;
  error?: { name: string; message: string; stack?: string };
}

export type LogLineInput = Omit<LogLine, 'timestamp' | 'level'>;

/** Anything carrying a machine-readable code, e.g. a ForumError. */
export interface CodedFailure {
  code: string;
  message: string;
}

export class Logger {
  constructor(private readonly minLevel: LogLevel) {}

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.minLevel];
  }

  write(level: LogLevel, input: LogLineInput): void {
    if (!this.isLevelEnabled(level)) return;

    const line: LogLine = { timestamp: new Date().toISOString(), level, ...input };
    if (line.fields && Object.keys(line.fields).length === 0) delete line.fields;
    const text = JSON.stringify(line);

    switch (level) {
      case 'error':
        console.error(text);
        break;
      case 'warn':
        console.warn(text);
        break;
      default:
        console.log(text);
    }
  }

  error(message: string, error?: Error, fields?: Record<string, unknown>): void {
    this.write('error', {
      module: 'main',
      message,
      fields,
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
    });
  }

  forModule(module: string): ModuleLogger {
    return new ModuleLogger(this, module);
  }
}

export class ModuleLogger {
  constructor(
    private readonly root: Logger,
    readonly module: string,
  ) {}

  debug(message: string, fields?: Record<string, unknown>): void {
    this.root.write('debug', { module: this.module, message, fields });
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.root.write('info', { module: this.module, message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.root.write('warn', { module: this.module, message, fields });
  }

  // Rejections are routine under load, so they stay at debug.
  rejected(operation: string, failure: CodedFailure): void {
    this.root.write('debug', {
      module: this.module,
      message: failure.message,
      operation,
      code: failure.code,
    });
  }
}

const LOGGER_KEY = '__forumLogger__';

export function getLogger(): Logger {
  const g = globalThis as unknown as Record<string, unknown>;
  const existing = g[LOGGER_KEY];
  if (existing instanceof Logger) return existing;

  const created = new Logger(APP_CONFIG.logLevel);
  g[LOGGER_KEY] = created;
  return created;
}

export const logger = getLogger();
