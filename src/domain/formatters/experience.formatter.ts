import { escapeLatex } from '../services/latex-text';
import { inspectExperience } from '../services/section-shapes';
import { NormalizedExperienceEntry } from '../types/resume.types';
import {
  CLOSE_SUBHEADING_LIST,
  itemList,
  openSubHeadingList,
  subheading,
} from './latex-blocks';

function formatJob(job: NormalizedExperienceEntry): string {
  return (
    subheading(
      escapeLatex(job.title),
      escapeLatex(job.dates),
      escapeLatex(job.company),
      escapeLatex(job.location),
    ) + itemList(job.details.map((detail) => escapeLatex(detail)))
  );
}

export function formatExperience(raw: unknown): string {
  const shape = inspectExperience(raw);
  const body = shape.kind === 'structured' ? shape.entries.map(formatJob).join('') : '';
  return openSubHeadingList('Experience') + body + CLOSE_SUBHEADING_LIST;
}
