/**
 * Tagged console logger
 *
 * Debug and info output is off unless debug mode is enabled, either with
 * setDebugMode() or with FRAME_BUFFER_DEBUG=1 in the environment.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  tag: string;
  message: string;
  timestamp: number;
}

const PREFIX = 'video-frame-buffers';

/**
 * Whether FRAME_BUFFER_DEBUG asks for debug output
 */
export function isDebugEnvEnabled(): boolean {
  const value = process.env.FRAME_BUFFER_DEBUG;
  return value === '1' || value === 'true';
}

let debugMode = isDebugEnvEnabled();

/**
 * Enable or disable debug and info output for every logger
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export function isDebugMode(): boolean {
  return debugMode;
}

export class Logger {
  constructor(readonly tag: string) {}

  debug(message: string, ...args: unknown[]): void {
    if (debugMode) this.write({ level: 'debug', tag: this.tag, message, timestamp: Date.now() }, args);
  }

  info(message: string, ...args: unknown[]): void {
    if (debugMode) this.write({ level: 'info', tag: this.tag, message, timestamp: Date.now() }, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write({ level: 'warn', tag: this.tag, message, timestamp: Date.now() }, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write({ level: 'error', tag: this.tag, message, timestamp: Date.now() }, args);
  }

  private write(entry: LogEntry, args: unknown[]): void {
    const line = `[${PREFIX}:${entry.tag}] ${entry.message}`;
    switch (entry.level) {
      case 'debug':
        console.debug(line, ...args);
        break;
      case 'info':
        console.info(line, ...args);
        break;
      case 'warn':
        console.warn(line, ...args);
        break;
      case 'error':
        console.error(line, ...args);
        break;
    }
  }
}

/**
 * Create a logger whose lines are prefixed with `tag`
 */
export function createLogger(tag: string): Logger {
  return new Logger(tag);
}
