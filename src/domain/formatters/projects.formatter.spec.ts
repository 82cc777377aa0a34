import { formatProjects } from './projects.formatter';

const OPEN = '\\section{Projects}\n\\resumeSubHeadingListStart\n';
const CLOSE = '\\resumeSubHeadingListEnd\n';

describe('formatProjects', () => {
  it('should inline short technology lists in the heading', () => {
    const result = formatProjects([
      {
        name: 'Tracker',
        technologies: ['Go', 'Redis'],
        details: ['Handles 10k req/s'],
      },
    ]);

    expect(result).toBe(
      OPEN +
        '\\resumeProjectHeading\n{\\textbf{Tracker} $|$ \\emph{Go, Redis}}{}\n' +
        '\\resumeItemListStart\n\\resumeItem{Handles 10k req/s}\n\\resumeItemListEnd\n' +
        CLOSE,
    );
  });

  it('should move technology text longer than 40 characters into the first bullet', () => {
    const technologies = 'TypeScript, NestJS, PostgreSQL, Redis, Docker';
    const result = formatProjects([
      { title: 'Platform', technologies_used: technologies, details: ['Shipped'] },
    ]);

    expect(result).toBe(
      OPEN +
        '\\resumeProjectHeading\n{\\textbf{Platform}}{}\n' +
        '\\resumeItemListStart\n' +
        `\\resumeItem{\\emph{Technologies:} ${technologies}}\n` +
        '\\resumeItem{Shipped}\n' +
        '\\resumeItemListEnd\n' +
        CLOSE,
    );
  });

  it('should measure the escaped technology text', () => {
    // 38 raw characters, 42 once each underscore gains a backslash.
    const technologies = 'a_b c_d e_f g_h ijklmnopqrstuvwxyzabcd';
    const result = formatProjects([{ name: 'X', technologies }]);

    expect(result).toContain('\\resumeProjectHeading\n{\\textbf{X}}{}\n');
    expect(result).toContain('\\resumeItem{\\emph{Technologies:} a\\_b c\\_d e\\_f g\\_h');
  });

  it('should use the description when details are missing', () => {
    const result = formatProjects([{ name: 'Site', description: 'Personal site' }]);

    expect(result).toBe(
      OPEN +
        '\\resumeProjectHeading\n{\\textbf{Site}}{}\n' +
        '\\resumeItemListStart\n\\resumeItem{Personal site}\n\\resumeItemListEnd\n' +
        CLOSE,
    );
  });

  it('should omit the item list for a project without bullets', () => {
    expect(formatProjects([{ name: 'Bare' }])).toBe(
      OPEN + '\\resumeProjectHeading\n{\\textbf{Bare}}{}\n' + CLOSE,
    );
  });

  it('should return an empty closed section for absent input', () => {
    expect(formatProjects(null)).toBe(OPEN + CLOSE);
    expect(formatProjects({ name: 'x' })).toBe(OPEN + CLOSE);
  });
});
