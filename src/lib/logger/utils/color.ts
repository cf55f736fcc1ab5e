import chalk from 'chalk';
import type { LogType } from '../types';

const colorizers: Record<Exclude<LogType, 'raw'>, (text: string) => string> =
  {
    error: chalk.red,
    warn: chalk.yellow,
    notice: chalk.blue,
    success: chalk.green,
    info: chalk.white,
    debug: chalk.gray,
  };

/**
 * Colorize text for terminal output
 */
export function colorize(type: Exclude<LogType, 'raw'>, text: string): string {
  return colorizers[type](text);
}
