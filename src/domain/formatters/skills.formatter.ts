import { LINE_BREAK, TECHNICAL_SKILLS_LABEL } from '../constants/latex.constants';
import { escapeLatex } from '../services/latex-text';
import { inspectSkills } from '../services/section-shapes';
import {
  SkillCategory,
  SkillCategoryValue,
  SkillGroup,
} from '../types/resume.types';

const SKILLS_OPEN =
  '\\section{Technical Skills}\n' +
  '\\begin{itemize}[leftmargin=0pt, itemindent=0pt, labelwidth=0pt, labelsep=0pt, align=left, label={}]%\n' +
  '\\small{\\item{\n';

const SKILLS_CLOSE = '\n}}\n\\end{itemize}\n';

function boldLine(label: string, text: string): string {
  return `\\textbf{${escapeLatex(label)}}: ${text}`;
}

function joinItems(items: readonly string[]): string {
  return items.map((item) => escapeLatex(item)).join(', ');
}

function groupLines(groups: readonly SkillGroup[]): string[] {
  return groups
    .filter((group) => group.items.length > 0)
    .map((group) => boldLine(group.label, joinItems(group.items)));
}

/** A category as a single line, or null when it has nothing to show. */
function categoryLine(label: string, value: SkillCategoryValue): string | null {
  switch (value.kind) {
    case 'nested': {
      const lines = groupLines(value.groups);
      return lines.length > 0 ? `\\textbf{${escapeLatex(label)}}: ${lines.join(LINE_BREAK)}` : null;
    }
    case 'list':
      return value.items.length > 0 ? boldLine(label, joinItems(value.items)) : null;
    case 'text':
      return value.text.trim() !== '' ? boldLine(label, escapeLatex(value.text)) : null;
  }
}

function structuredLines(categories: readonly SkillCategory[]): string[] {
  const lines: string[] = [];

  // "Technical Skills" leads; when nested, its groups stand on their own.
  const technical = categories.find((c) => c.label === TECHNICAL_SKILLS_LABEL);
  if (technical?.value.kind === 'nested') {
    lines.push(...groupLines(technical.value.groups));
  } else if (technical) {
    const line = categoryLine(technical.label, technical.value);
    if (line) lines.push(line);
  }

  for (const category of categories) {
    if (category === technical) continue;
    const line = categoryLine(category.label, category.value);
    if (line) lines.push(line);
  }
  return lines;
}

function legacyLine(line: string): string {
  const colon = line.indexOf(':');
  if (colon === -1) return escapeLatex(line);
  const label = line.slice(0, colon).trim();
  const items = line.slice(colon + 1).trim();
  return boldLine(label, escapeLatex(items));
}

export function formatSkills(raw: unknown): string {
  const shape = inspectSkills(raw);
  let lines: string[] = [];
  if (shape.kind === 'structured') lines = structuredLines(shape.categories);
  if (shape.kind === 'legacy') lines = shape.lines.map(legacyLine);

  return SKILLS_OPEN + lines.join(LINE_BREAK) + SKILLS_CLOSE;
}
