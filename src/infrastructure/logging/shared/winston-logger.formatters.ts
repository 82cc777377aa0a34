import * as winston from 'winston';
import { RenderContextService } from './render-context.service';
import { deepRedact, REDACTED, shouldRedact } from './utils/redaction.util';

const levelIcon: Record<string, string> = {
  error: '⛔',
  warn: '⚠',
  info: 'ℹ',
  http: '🌐',
  verbose: '🔍',
  debug: '🐞',
  silly: '✨',
};

// Keys the console line renders itself, or that only matter in files.
const CONSOLE_OMITTED_KEYS = new Set([
  'timestamp',
  'level',
  'levelName',
  'message',
  'context',
  'trace',
  'renderId',
  'outputName',
]);

function humanizeValueInline(value: unknown): string {
  if (value == null) return String(value);
  if (Array.isArray(value)) return value.map(humanizeValueInline).join(', ');
  if (typeof value === 'object') return humanizeObjectInline(Object.entries(value));
  return String(value);
}

function humanizeObjectInline(entries: [string, unknown][]): string {
  return entries.map(([k, v]) => `${k}=${humanizeValueInline(v)}`).join(' ');
}

function parseContextObject(context: string): Record<string, unknown> | null {
  if (!context.startsWith('{') || !context.endsWith('}')) return null;
  try {
    const parsed: unknown = JSON.parse(context);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : null;
  } catch {
    return null;
  }
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    info[key] = shouldRedact(key) ? REDACTED : deepRedact(info[key]);
  }
  return info;
});

// colorize() rewrites `level`, so the plain name is kept for the icon lookup.
const keepLevelNameFormat = winston.format((info) => {
  info.levelName = info.level;
  return info;
});

export function makeAttachRenderContextFormat(ctx?: RenderContextService) {
  return winston.format((info) => {
    const store = ctx?.getStore();
    if (store?.renderId && info.renderId === undefined) info.renderId = store.renderId;
    if (store?.outputName && info.outputName === undefined) {
      info.outputName = store.outputName;
    }
    return info;
  });
}

export function makePrettyConsoleFormat(ctx?: RenderContextService) {
  return winston.format.combine(
    makeAttachRenderContextFormat(ctx)(),
    redactFormat(),
    keepLevelNameFormat(),
    winston.format.colorize({ all: true }),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf((info) => {
      const renderPart = info.renderId ? ` [render:${String(info.renderId)}]` : '';

      let contextLabel = '';
      let detailsPart = '';
      if (typeof info.context === 'string') {
        const parsed = parseContextObject(info.context);
        if (parsed) detailsPart = ` ${humanizeObjectInline(Object.entries(parsed))}`;
        else contextLabel = ` [${info.context}]`;
      }

      const extra = Object.entries(info).filter(
        ([key]) => !CONSOLE_OMITTED_KEYS.has(key),
      );
      const restPart = extra.length ? ` ${humanizeObjectInline(extra)}` : '';
      const tracePart = typeof info.trace === 'string' ? `\n${info.trace}` : '';

      const icon = levelIcon[String(info.levelName)] ?? '•';
      const text = `${String(info.message)}${detailsPart}${restPart}`.trim();
      const line = `${String(info.timestamp)} ${icon} ${info.level.toUpperCase().padEnd(7)}${renderPart}${contextLabel}: ${text}`;
      return `${line}${tracePart}`.trimEnd();
    }),
  );
}

export function makeJsonFileFormat(ctx?: RenderContextService) {
  return winston.format.combine(
    makeAttachRenderContextFormat(ctx)(),
    redactFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  );
}
