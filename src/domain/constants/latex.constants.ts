import { SectionKey } from '../types/resume.types';

// Backslash maps to a marker whose braces must survive untouched, so all
// substitutions happen in one pass over the input.
export const LATEX_SPECIAL_CHARS: Readonly<Record<string, string>> = {
  '\\': '\\textbackslash{}',
  '&': '\\&',
  '%': '\\%',
  $: '\\$',
  '#': '\\#',
  _: '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}',
};

export const LATEX_SPECIAL_PATTERN = /[\\&%$#_{}~^]/g;

export const EMAIL_PATTERN = /@.*\./;
export const LINKEDIN_MARKER = 'linkedin.com';
export const GITHUB_MARKER = 'github.com';
export const PHONE_MIN_DIGITS = 7;

export const CONTACT_SEPARATOR = ' $|$ ';
export const LINE_BREAK = ' \\\\\n';
export const PLACEHOLDER_NAME = 'Your Name';
export const PLACEHOLDER_CONTACT = 'phone $|$ email $|$ linkedin $|$ github';

export const TECHNICAL_SKILLS_LABEL = 'Technical Skills';

/** Longest escaped technology list still inlined next to a project name. */
export const INLINE_TECHNOLOGIES_MAX_LENGTH = 40;

const MONTH = '(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\\.?';

export const EDUCATION_PATTERNS = {
  institutionKeyword: /(University|Institute|College)/,
  institutionTailStop: new RegExp(
    `\\b(?:Master|Bachelor|PhD|Doctor)|\\b${MONTH}\\s+\\d{4}`,
  ),
  institutionHead: /(?:[A-Z][\w&.'-]*\s+)*[A-Z][\w&.'-]*\s*$/,
  location: /\b[A-Z][a-z]+,\s*[A-Z]{2}\b/g,
  degree: new RegExp(
    `\\b(?:Master|Bachelor|PhD|Doctor)[^,\\n]*?(?:Science|Arts|Engineering|Computer)[^,\\n]*?(?=\\s+${MONTH}\\s+\\d{4}|\\s*[,\\n]|\\s*$)`,
    'g',
  ),
  dates: new RegExp(
    `\\b${MONTH}\\s+\\d{4}\\s*[–—-]+\\s*(?:${MONTH}\\s+\\d{4}|Present|Current)`,
    'g',
  ),
};

export interface TemplateRegion {
  section: SectionKey;
  /** Markers opening the region, in order; whitespace may separate them. */
  begin: readonly string[];
  end: string;
}

export const TEMPLATE_REGIONS: readonly TemplateRegion[] = [
  {
    section: 'personal_info',
    begin: ['\\begin{center}', '\\textbf{\\Huge \\scshape'],
    end: '\\end{center}',
  },
  {
    section: 'education',
    begin: ['\\section{Education}', '\\resumeSubHeadingListStart'],
    end: '\\resumeSubHeadingListEnd',
  },
  {
    section: 'experience',
    begin: ['\\section{Experience}', '\\resumeSubHeadingListStart'],
    end: '\\resumeSubHeadingListEnd',
  },
  {
    section: 'projects',
    begin: ['\\section{Projects}', '\\resumeSubHeadingListStart'],
    end: '\\resumeSubHeadingListEnd',
  },
  {
    section: 'skills',
    begin: ['\\section{Technical Skills}', '\\begin{itemize}'],
    end: '\\end{itemize}',
  },
];

/** Sample `\resumeSubheading` blocks left behind after a section. */
export const ORPHAN_BOILERPLATE_PATTERN =
  /%-{3,}\s*\\resumeSubheading[\s\S]*?(?=\\section|\s*\\end\{document\})/g;

export const INTERMEDIATE_EXTENSIONS: readonly string[] = [
  '.aux',
  '.log',
  '.out',
  '.toc',
  '.lof',
  '.lot',
  '.bbl',
  '.blg',
  '.fls',
  '.fdb_latexmk',
  '.synctex.gz',
  '.nav',
  '.snm',
  '.vrb',
  '.run.xml',
  '.bcf',
  '.dvi',
  '.xdv',
];
