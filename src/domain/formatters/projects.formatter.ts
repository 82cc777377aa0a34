import { INLINE_TECHNOLOGIES_MAX_LENGTH } from '../constants/latex.constants';
import { escapeLatex } from '../services/latex-text';
import { inspectProjects } from '../services/section-shapes';
import { NormalizedProjectEntry } from '../types/resume.types';
import {
  CLOSE_SUBHEADING_LIST,
  itemList,
  openSubHeadingList,
  projectHeading,
} from './latex-blocks';

function formatProject(project: NormalizedProjectEntry): string {
  const name = `\\textbf{${escapeLatex(project.name)}}`;
  const technologies = escapeLatex(project.technologies);
  const bullets = project.details.map((detail) => escapeLatex(detail));

  // Long technology lists move out of the heading into the first bullet.
  if (technologies.length > INLINE_TECHNOLOGIES_MAX_LENGTH) {
    return (
      projectHeading(name) +
      itemList([`\\emph{Technologies:} ${technologies}`, ...bullets])
    );
  }

  const heading = technologies ? `${name} $|$ \\emph{${technologies}}` : name;
  return projectHeading(heading) + itemList(bullets);
}

export function formatProjects(raw: unknown): string {
  const shape = inspectProjects(raw);
  const body = shape.kind === 'structured' ? shape.entries.map(formatProject).join('') : '';
  return openSubHeadingList('Projects') + body + CLOSE_SUBHEADING_LIST;
}
