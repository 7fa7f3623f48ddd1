/**
 * Lightweight logger with emoji-prefixed categories and timing.
 *
 * Everything goes to stderr: stdout carries only the rendered path.
 *
 * Usage:
 *   logger.data('dataset', 'Parsed 1204 records')
 *   // → 📋 [dataset] Parsed 1204 records
 *
 *   logger.time('dataset', 'load')
 *   // ... work ...
 *   logger.timeEnd('dataset', 'load')
 *   // → ⏱️ [dataset] load: 42ms
 */

const ICONS = {
  data: '📋',
  graph: '🌳',
  path: '🧭',
  config: '⚙️',
  ok: '✅',
  warn: '⚠️',
  error: '❌',
  start: '▶️',
  done: '✔️',
  time: '⏱️',
} as const;

type Icon = keyof typeof ICONS;

export type LogLevel = 'silent' | 'error' | 'warn' | 'info';

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
};

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info'];

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((known) => known === value);

let level: LogLevel = 'info';
const timers = new Map<string, number>();

export function setLogLevel(next: LogLevel): void {
  level = next;
}

export function getLogLevel(): LogLevel {
  return level;
}

function write(at: Exclude<LogLevel, 'silent'>, icon: string, ctx: string, msg: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[at]) return;
  console.error(`${icon} [${ctx}] ${msg}`);
}

function makeLogger(icon: Icon) {
  const emoji = ICONS[icon];
  if (icon === 'error') return (ctx: string, msg: string) => write('error', emoji, ctx, msg);
  if (icon === 'warn') return (ctx: string, msg: string) => write('warn', emoji, ctx, msg);
  return (ctx: string, msg: string) => write('info', emoji, ctx, msg);
}

export const logger = {
  data: makeLogger('data'),
  graph: makeLogger('graph'),
  path: makeLogger('path'),
  config: makeLogger('config'),
  ok: makeLogger('ok'),
  warn: makeLogger('warn'),
  error: makeLogger('error'),
  start: makeLogger('start'),
  done: makeLogger('done'),

  time(ctx: string, label: string): void {
    timers.set(`${ctx}:${label}`, performance.now());
  },

  timeEnd(ctx: string, label: string): void {
    const key = `${ctx}:${label}`;
    const start = timers.get(key);
    if (start === undefined) {
      write('info', ICONS.time, ctx, `${label}: no timer found`);
      return;
    }
    timers.delete(key);
    const elapsed = performance.now() - start;
    const formatted = elapsed >= 1000
      ? `${(elapsed / 1000).toFixed(1)}s`
      : `${Math.round(elapsed)}ms`;
    write('info', ICONS.time, ctx, `${label}: ${formatted}`);
  },
};
