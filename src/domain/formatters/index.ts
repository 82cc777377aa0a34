import { SectionKey } from '../types/resume.types';
import { formatEducation } from './education.formatter';
import { formatExperience } from './experience.formatter';
import { formatPersonalInfo } from './personal-info.formatter';
import { formatProjects } from './projects.formatter';
import { formatSkills } from './skills.formatter';

export type SectionFormatter = (raw: unknown) => string;

export const SECTION_FORMATTERS: Readonly<Record<SectionKey, SectionFormatter>> = {
  personal_info: formatPersonalInfo,
  education: formatEducation,
  experience: formatExperience,
  projects: formatProjects,
  skills: formatSkills,
};

export {
  formatEducation,
  formatExperience,
  formatPersonalInfo,
  formatProjects,
  formatSkills,
};
