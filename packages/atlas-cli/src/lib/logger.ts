import chalk from 'chalk';
import ora, { type Ora } from 'ora';

// Log levels: silent=0, error=1, warn=2, info=3, verbose=4
export const LOG_LEVEL_NAMES = ['silent', 'error', 'warn', 'info', 'verbose'] as const;
export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  verbose: 4,
};

let configuredLevel: LogLevel = 'info';

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/** Environment wins over the config file */
export function setLogLevel(level: LogLevel): void {
  configuredLevel = level;
}

function getLogLevel(): number {
  const envLevel = process.env['ATLAS_LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return LOG_LEVELS[envLevel];
  }
  return LOG_LEVELS[configuredLevel];
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] <= getLogLevel();
}

// Everything goes to stderr: stdout is reserved for result documents
function write(line: string): void {
  console.error(line);
}

export const logger = {
  /** General informational message */
  info(message: string): void {
    if (shouldLog('info')) write(chalk.blue('  i ') + message);
  },

  warn(message: string): void {
    if (shouldLog('warn')) write(chalk.yellow('  ! ') + chalk.yellow(message));
  },

  error(message: string): void {
    if (shouldLog('error')) write(chalk.red('  x ') + chalk.red(message));
  },

  success(message: string): void {
    if (shouldLog('info')) write(chalk.green('  v ') + chalk.green(message));
  },

  /** Only shown with ATLAS_LOG_LEVEL=verbose */
  verbose(message: string): void {
    if (shouldLog('verbose')) write(chalk.gray('  . ') + chalk.gray(message));
  },
};

/**
 * Create and start an ora spinner on stderr. A disabled spinner stays silent,
 * so `.succeed()` / `.fail()` are always safe to call.
 */
export function spinner(text: string, enabled = true): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
    stream: process.stderr,
    isSilent: !enabled || !shouldLog('info'),
  }).start();
}
