import { promises as fs } from 'fs';
import path from 'path';
import { serializeError } from './errors';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'CHAT';

export interface LoggerOptions {
  /** Directory for the dated JSON-lines file; `null` disables file output. */
  logDir?: string | null;
  console?: boolean;
}

export class Logger {
  private logDir: string | null;
  private logFile: string | null;
  private consoleOutput: boolean;
  private dirReady?: Promise<void>;

  constructor(options: LoggerOptions = {}) {
    this.logDir = options.logDir === undefined
      ? path.join(process.cwd(), process.env.LOG_DIR || 'logs')
      : options.logDir;
    this.logFile = this.logDir
      ? path.join(this.logDir, `app-${new Date().toISOString().split('T')[0]}.log`)
      : null;
    this.consoleOutput = options.console ?? true;
  }

  private ensureLogDir(dir: string): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = fs.mkdir(dir, { recursive: true }).then(() => undefined);
    }
    return this.dirReady;
  }

  private getTimestamp(): string {
    return new Date().toISOString();
  }

  private async writeLog(level: LogLevel, message: string, data?: unknown) {
    const timestamp = this.getTimestamp();
    const logEntry = {
      timestamp,
      level,
      message,
      ...(data !== undefined && { data: data instanceof Error ? serializeError(data) : data }),
    };

    if (this.consoleOutput) {
      console.log(`[${timestamp}] ${level}: ${message}`, data !== undefined ? data : '');
    }

    if (!this.logDir || !this.logFile) {
      return;
    }

    try {
      await this.ensureLogDir(this.logDir);
      await fs.appendFile(this.logFile, JSON.stringify(logEntry) + '\n', 'utf-8');
    } catch (error) {
      console.error('Failed to write log:', error);
    }
  }

  async info(message: string, data?: unknown) {
    await this.writeLog('INFO', message, data);
  }

  async error(message: string, data?: unknown) {
    await this.writeLog('ERROR', message, data);
  }

  async debug(message: string, data?: unknown) {
    await this.writeLog('DEBUG', message, data);
  }

  async warn(message: string, data?: unknown) {
    await this.writeLog('WARN', message, data);
  }

  // Phase-by-phase trace of one chat turn
  async chatQuery(requestId: string, phase: string, data?: unknown) {
    await this.writeLog('CHAT', `[${requestId}] ${phase}`, data);
  }
}

export const logger = new Logger();

let handlersInstalled = false;

export function installProcessHandlers(target: Logger = logger): void {
  if (handlersInstalled || typeof process === 'undefined') {
    return;
  }
  handlersInstalled = true;

  process.on('uncaughtException', (error: Error) => {
    void target.error('Uncaught Exception', serializeError(error));
  });

  process.on('unhandledRejection', (reason: unknown) => {
    void target.error('Unhandled Promise Rejection', serializeError(reason));
  });
}
