/**
 * Résumé record types. A record arrives as loosely shaped JSON; the shape
 * unions below are what section inspection makes of it.
 */

export type SectionKey =
  | 'personal_info'
  | 'education'
  | 'experience'
  | 'skills'
  | 'projects';

/** What the renderer accepts; each section is classified by shape on use. */
export type ResumeRecord = Record<string, unknown>;

// Normalised forms produced by shape inspection.

export interface ContactDetails {
  name?: string;
  email?: string;
  phone?: string;
  linkedin?: string;
  github?: string;
}

export interface NormalizedEducationEntry {
  institution: string;
  location: string;
  degree: string;
  dates: string;
  details: string[];
}

export interface NormalizedExperienceEntry {
  company: string;
  title: string;
  location: string;
  dates: string;
  details: string[];
}

export interface NormalizedProjectEntry {
  name: string;
  technologies: string;
  details: string[];
}

export type SkillCategoryValue =
  | { kind: 'list'; items: string[] }
  | { kind: 'text'; text: string }
  | { kind: 'nested'; groups: SkillGroup[] };

export interface SkillGroup {
  label: string;
  items: string[];
}

export interface SkillCategory {
  label: string;
  value: SkillCategoryValue;
}

export type PersonalInfoShape =
  | { kind: 'structured'; contact: ContactDetails }
  | { kind: 'legacy'; text: string }
  | { kind: 'absent' };

export type EducationShape =
  | { kind: 'structured'; entries: NormalizedEducationEntry[] }
  | { kind: 'legacy'; text: string }
  | { kind: 'absent' };

export type ExperienceShape =
  | { kind: 'structured'; entries: NormalizedExperienceEntry[] }
  | { kind: 'absent' };

export type ProjectsShape =
  | { kind: 'structured'; entries: NormalizedProjectEntry[] }
  | { kind: 'absent' };

export type SkillsShape =
  | { kind: 'structured'; categories: SkillCategory[] }
  | { kind: 'legacy'; lines: string[] }
  | { kind: 'absent' };
