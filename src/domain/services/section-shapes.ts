import {
  ContactDetails,
  EducationShape,
  ExperienceShape,
  NormalizedEducationEntry,
  NormalizedExperienceEntry,
  NormalizedProjectEntry,
  PersonalInfoShape,
  ProjectsShape,
  SkillCategory,
  SkillCategoryValue,
  SkillGroup,
  SkillsShape,
} from '../types/resume.types';
import { toDisplayString } from './latex-text';

type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(text: string): boolean {
  return text.trim() === '';
}

function optionalText(source: UnknownRecord, key: string): string | undefined {
  const text = toDisplayString(source[key]).trim();
  return text === '' ? undefined : text;
}

function requiredText(source: UnknownRecord, key: string): string {
  return optionalText(source, key) ?? '';
}

/** Detail bullets from a list, or from a lone string. Blank items are dropped. */
export function toDetailList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(toDisplayString).filter((item) => !isBlank(item));
  }
  if (typeof value === 'string' && !isBlank(value)) return [value];
  return [];
}

export function inspectPersonalInfo(raw: unknown): PersonalInfoShape {
  if (isRecord(raw)) {
    const contact: ContactDetails = {
      name: optionalText(raw, 'name'),
      email: optionalText(raw, 'email'),
      phone: optionalText(raw, 'phone'),
      linkedin: optionalText(raw, 'linkedin'),
      github: optionalText(raw, 'github'),
    };
    return { kind: 'structured', contact };
  }
  if (typeof raw === 'string' && !isBlank(raw)) {
    return { kind: 'legacy', text: raw };
  }
  return { kind: 'absent' };
}

export function inspectEducation(raw: unknown): EducationShape {
  if (Array.isArray(raw)) {
    const entries = raw.filter(isRecord).map(
      (entry): NormalizedEducationEntry => ({
        institution: requiredText(entry, 'institution'),
        location: requiredText(entry, 'location'),
        degree: requiredText(entry, 'degree'),
        dates: requiredText(entry, 'dates'),
        details: toDetailList(entry.details),
      }),
    );
    return { kind: 'structured', entries };
  }
  if (typeof raw === 'string' && !isBlank(raw)) {
    return { kind: 'legacy', text: raw };
  }
  return { kind: 'absent' };
}

export function inspectExperience(raw: unknown): ExperienceShape {
  if (!Array.isArray(raw)) return { kind: 'absent' };
  const entries = raw.filter(isRecord).map(
    (job): NormalizedExperienceEntry => ({
      company: requiredText(job, 'company'),
      title: requiredText(job, 'title'),
      location: requiredText(job, 'location'),
      dates: requiredText(job, 'dates'),
      details: toDetailList(job.details),
    }),
  );
  return { kind: 'structured', entries };
}

export function inspectProjects(raw: unknown): ProjectsShape {
  if (!Array.isArray(raw)) return { kind: 'absent' };
  const entries = raw.filter(isRecord).map((project): NormalizedProjectEntry => {
    const technologies = project.technologies_used ?? project.technologies;
    const details = toDetailList(project.details);
    return {
      name: optionalText(project, 'name') ?? requiredText(project, 'title'),
      technologies: Array.isArray(technologies)
        ? technologies
            .map(toDisplayString)
            .filter((tech) => !isBlank(tech))
            .join(', ')
        : toDisplayString(technologies).trim(),
      details: details.length > 0 ? details : toDetailList(project.description),
    };
  });
  return { kind: 'structured', entries };
}

function toSkillItems(value: unknown[]): string[] {
  return value.map(toDisplayString).filter((item) => !isBlank(item));
}

function inspectSkillGroups(groups: UnknownRecord): SkillGroup[] {
  const result: SkillGroup[] = [];
  for (const [label, value] of Object.entries(groups)) {
    // Only one level of nesting is understood; deeper mappings are dropped.
    if (Array.isArray(value)) {
      result.push({ label, items: toSkillItems(value) });
    } else if (typeof value === 'string') {
      result.push({ label, items: isBlank(value) ? [] : [value] });
    }
  }
  return result;
}

function inspectSkillCategory(value: unknown): SkillCategoryValue {
  if (Array.isArray(value)) return { kind: 'list', items: toSkillItems(value) };
  if (isRecord(value)) {
    return { kind: 'nested', groups: inspectSkillGroups(value) };
  }
  return { kind: 'text', text: toDisplayString(value) };
}

export function inspectSkills(raw: unknown): SkillsShape {
  if (isRecord(raw)) {
    const categories: SkillCategory[] = Object.entries(raw).map(
      ([label, value]) => ({ label, value: inspectSkillCategory(value) }),
    );
    return { kind: 'structured', categories };
  }
  if (Array.isArray(raw)) {
    return { kind: 'legacy', lines: toSkillItems(raw) };
  }
  return { kind: 'absent' };
}
