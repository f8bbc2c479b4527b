import chalk from 'chalk';

export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

interface LoggerState {
  debug: boolean;
  silent: boolean;
}

const state: LoggerState = {
  debug: process.env.FEEDSTASH_DEBUG === '1',
  silent: false,
};

class Logger {
  constructor(private readonly prefix?: string) {}

  setDebug(enabled: boolean): void {
    state.debug = enabled;
  }

  // --json 输出时关闭提示信息，只保留错误
  setSilent(enabled: boolean): void {
    state.silent = enabled;
  }

  isDebug(): boolean {
    return state.debug;
  }

  scope(name: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${name}` : name);
  }

  private format(message: string): string {
    return this.prefix ? `${chalk.dim(`[${this.prefix}]`)} ${message}` : message;
  }

  info(message: string): void {
    if (state.silent) return;
    console.log(chalk.blue('ℹ'), this.format(message));
  }

  success(message: string): void {
    if (state.silent) return;
    console.log(chalk.green('✓'), this.format(message));
  }

  warn(message: string): void {
    if (state.silent) return;
    console.warn(chalk.yellow('⚠'), this.format(message));
  }

  error(message: string): void {
    console.error(chalk.red('✗'), this.format(message));
  }

  debug(message: string): void {
    if (state.debug) {
      console.error(chalk.gray('[DEBUG]'), this.format(message));
    }
  }
}

export const logger = new Logger();
export type { Logger };
