import chalk from 'chalk';
import type { AppConfig, LogLevel } from '../config/config.js';

export type { LogLevel };

export interface Logger {
  info(context: string, message: string): void;
  debug(context: string, message: string): void;
  warn(context: string, message: string): void;
  error(context: string, message: string): void;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.bgBlue.black,
  info: chalk.bgGreen.black,
  warn: chalk.bgYellow.black,
  error: chalk.bgRed.white,
};

// Stable per-module colour so the same context always reads the same
const MODULE_COLORS = [chalk.cyan, chalk.magenta, chalk.blue, chalk.green, chalk.yellow];

const moduleColorMap = new Map<string, (text: string) => string>();

function getModuleColor(context: string): (text: string) => string {
  const cached = moduleColorMap.get(context);
  if (cached) return cached;
  const hash = context.split('').reduce((acc, char) => acc + char.charCodeAt(0), 0);
  const color = MODULE_COLORS[hash % MODULE_COLORS.length] ?? chalk.white;
  moduleColorMap.set(context, color);
  return color;
}

const LEVEL_ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function shouldLog(level: LogLevel, current: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(current);
}

function formatTimestamp(d: Date): string {
  return d.toISOString().replace('T', ' ').replace('Z', '').slice(0, -1);
}

export function formatErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createLogger(cfg: Pick<AppConfig, 'logging'>): Logger {
  const currentLevel = cfg.logging.level;
  const colorEnabled = cfg.logging.color;
  const json = cfg.logging.format === 'json';

  const base = (level: LogLevel) => (context: string, message: string) => {
    if (!shouldLog(level, currentLevel)) return;

    const now = new Date();
    let line: string;
    if (json) {
      line = JSON.stringify({ level, ts: now.toISOString(), module: context, msg: message });
    } else {
      const ts = colorEnabled ? chalk.gray(formatTimestamp(now)) : formatTimestamp(now);
      const levelTag = colorEnabled
        ? LEVEL_COLORS[level](` ${level.toUpperCase()} `)
        : `[${level.toUpperCase()}]`;
      const moduleTag = colorEnabled ? getModuleColor(context)(`[${context}]`) : `[${context}]`;
      line = `${ts} ${levelTag} ${moduleTag} ${message}`;
    }

    switch (level) {
      case 'debug':
      case 'info':
        console.log(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  };
  return {
    info: base('info'),
    debug: base('debug'),
    warn: base('warn'),
    error: base('error'),
  };
}
