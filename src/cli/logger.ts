import chalk from 'chalk';

export type CliLogger = {
  info: (msg: string) => void;
  success: (msg: string) => void;
  warning: (msg: string) => void;
  error: (msg: string) => void;
  debug: (msg: string) => void;
};

export function createCliLogger(write: (line: string) => void): CliLogger {
  return {
    info: (msg: string) => write(`${chalk.blue('ℹ')} ${msg}`),
    success: (msg: string) => write(`${chalk.green('✓')} ${msg}`),
    warning: (msg: string) => write(`${chalk.yellow('⚠')} ${msg}`),
    error: (msg: string) => write(`${chalk.red('✗')} ${msg}`),
    debug: (msg: string) => write(`${chalk.gray('◉')} ${msg}`)
  };
}
