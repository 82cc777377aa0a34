import { EDUCATION_PATTERNS } from '../constants/latex.constants';
import { escapeLatex } from '../services/latex-text';
import { inspectEducation } from '../services/section-shapes';
import { NormalizedEducationEntry } from '../types/resume.types';
import {
  CLOSE_SUBHEADING_LIST,
  itemList,
  openSubHeadingList,
  subheading,
} from './latex-blocks';

/** Removes a trailing copy of the location from the institution name. */
export function stripLocationSuffix(
  institution: string,
  location: string,
): string {
  if (!location || !institution.endsWith(location)) return institution;
  const stripped = institution
    .slice(0, institution.length - location.length)
    .replace(/[\s,;]+$/, '');
  return stripped === '' ? institution : stripped;
}

function extractInstitutions(text: string): string[] {
  const parts = text.split(EDUCATION_PATTERNS.institutionKeyword);
  const institutions: string[] = [];

  // split() keeps the captured keyword, so keywords sit at odd indexes.
  for (let i = 1; i < parts.length; i += 2) {
    const before = parts[i - 1] ?? '';
    const after = parts[i + 1] ?? '';

    const head = EDUCATION_PATTERNS.institutionHead.exec(before)?.[0].trim() ?? '';
    const stop = EDUCATION_PATTERNS.institutionTailStop.exec(after);
    const tail = (stop ? after.slice(0, stop.index) : after).trim();

    let institution = head ? `${head} ${parts[i]}` : (parts[i] ?? '');
    if (tail) institution += tail.startsWith(',') ? tail : ` ${tail}`;
    institutions.push(institution);
  }
  return institutions;
}

function matchAll(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(pattern), (match) => match[0].trim());
}

/**
 * Best-effort recovery of entries from a free-text education paragraph.
 * Extractions are zipped by position; a position needs an institution and
 * at least a degree or a date range to survive.
 */
export function parseLegacyEducation(text: string): NormalizedEducationEntry[] {
  const institutions = extractInstitutions(text);
  const locations = matchAll(text, EDUCATION_PATTERNS.location);
  const degrees = matchAll(text, EDUCATION_PATTERNS.degree);
  const dates = matchAll(text, EDUCATION_PATTERNS.dates);

  const count = Math.max(
    institutions.length,
    locations.length,
    degrees.length,
    dates.length,
  );

  const entries: NormalizedEducationEntry[] = [];
  for (let i = 0; i < count; i++) {
    const entry: NormalizedEducationEntry = {
      institution: institutions[i] ?? '',
      location: locations[i] ?? '',
      degree: degrees[i] ?? '',
      dates: dates[i] ?? '',
      details: [],
    };
    if (entry.institution && (entry.degree || entry.dates)) {
      entries.push(entry);
    }
  }
  return entries;
}

function formatEntry(entry: NormalizedEducationEntry): string {
  const institution = stripLocationSuffix(entry.institution, entry.location);
  return (
    subheading(
      escapeLatex(institution),
      escapeLatex(entry.location),
      escapeLatex(entry.degree),
      escapeLatex(entry.dates),
    ) + itemList(entry.details.map((detail) => escapeLatex(detail)))
  );
}

export function formatEducation(raw: unknown): string {
  const shape = inspectEducation(raw);
  let entries: NormalizedEducationEntry[] = [];
  if (shape.kind === 'structured') entries = shape.entries;
  if (shape.kind === 'legacy') entries = parseLegacyEducation(shape.text);

  return (
    openSubHeadingList('Education') +
    entries.map(formatEntry).join('') +
    CLOSE_SUBHEADING_LIST
  );
}
