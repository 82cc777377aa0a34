import { v4 as uuidv4 } from 'uuid';

const pad = (value: number) => String(value).padStart(2, '0');

/** `resume_<YYYYMMDD>_<HHMMSS>_<8 hex chars>` in local time. */
export function generateOutputName(now: Date = new Date(), id: string = uuidv4()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `resume_${date}_${time}_${id.replace(/-/g, '').slice(0, 8)}`;
}

/** Drops everything from the first dot, then anything outside [A-Za-z0-9]. */
export function sanitizeOutputName(name: string): string {
  const [stem = ''] = name.split('.');
  return stem.replace(/[^A-Za-z0-9]/g, '');
}

export function resolveOutputName(requested?: string | null): string {
  const sanitized = requested ? sanitizeOutputName(requested) : '';
  return sanitized || generateOutputName();
}
