/**
 * Structured logging bound to a bootstrap run and, optionally, a module.
 */

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'json' | 'text';

export interface WritableOutput {
  write(s: string): void;
}

export interface ContextLoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
  runId?: string | null;
  moduleId?: string | null;
}

export class ContextLogger {
  private readonly _name: string;
  private readonly _format: LogFormat;
  private readonly _level: LogLevel;
  private readonly _levelValue: number;
  private readonly _redactSensitive: boolean;
  private readonly _output: WritableOutput;
  private readonly _runId: string | null;
  private readonly _moduleId: string | null;

  constructor(options?: ContextLoggerOptions) {
    this._name = options?.name ?? 'modhost';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level];
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => console.error(s) };
    this._runId = options?.runId ?? null;
    this._moduleId = options?.moduleId ?? null;
  }

  get runId(): string | null {
    return this._runId;
  }

  get moduleId(): string | null {
    return this._moduleId;
  }

  /** Derive a logger sharing output and level, with some bindings replaced. */
  child(bindings: { name?: string; runId?: string | null; moduleId?: string | null }): ContextLogger {
    return new ContextLogger({
      name: bindings.name ?? this._name,
      format: this._format,
      level: this._level,
      redactSensitive: this._redactSensitive,
      output: this._output,
      runId: bindings.runId !== undefined ? bindings.runId : this._runId,
      moduleId: bindings.moduleId !== undefined ? bindings.moduleId : this._moduleId,
    });
  }

  private _emit(levelName: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    if (LEVELS[levelName] < this._levelValue) return;

    let redactedExtra: Record<string, unknown> | null = extra ?? null;
    if (extra != null && this._redactSensitive) {
      redactedExtra = {};
      for (const [k, v] of Object.entries(extra)) {
        redactedExtra[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        run_id: this._runId,
        module_id: this._moduleId,
        logger: this._name,
        extra: redactedExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      const lvl = levelName.toUpperCase();
      const run = this._runId ?? 'none';
      const mod = this._moduleId ?? 'none';
      let extrasStr = '';
      if (redactedExtra) {
        extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${String(v)}`).join(' ');
      }
      this._output.write(`${ts} [${lvl}] [run=${run}] [module=${mod}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

/** Logger that discards everything; handy for embedding and tests. */
export function silentLogger(): ContextLogger {
  return new ContextLogger({ output: { write: () => undefined }, level: 'fatal' });
}

/** Standard extras for logging a failure. */
export function errorExtra(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = 'code' in err ? String(err.code) : err.name;
    return { error_code: code, error_message: err.message };
  }
  return { error_code: 'UNKNOWN', error_message: String(err) };
}
