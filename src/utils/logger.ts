import chalk from 'chalk';
import { Verbosity } from '../interfaces/logger';

export { Verbosity };

// Color helpers for use across the codebase
export const red = (text: string): string => chalk.red(text);
export const blue = (text: string): string => chalk.blue(text);
export const bold = (text: string): string => chalk.bold(text);

function writeLine(message: string): void {
  process.stdout.write(message.endsWith('\n') ? message : message + '\n');
}

export function log(
  message: string,
  level: Verbosity,
  currentVerbosity: number,
): void {
  if (currentVerbosity >= level) {
    writeLine(message);
  }
}

export function error(message: string): void {
  writeLine(red(`❌ ${message}`));
}

export function info(message: string, currentVerbosity: number): void {
  log(blue(`ℹ️  ${message}`), Verbosity.Normal, currentVerbosity);
}

export function verbose(message: string, currentVerbosity: number): void {
  log(message, Verbosity.Verbose, currentVerbosity);
}

export function always(message: string): void {
  writeLine(message);
}
