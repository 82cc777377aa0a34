import { formatSkills } from './skills.formatter';

const OPEN =
  '\\section{Technical Skills}\n' +
  '\\begin{itemize}[leftmargin=0pt, itemindent=0pt, labelwidth=0pt, labelsep=0pt, align=left, label={}]%\n' +
  '\\small{\\item{\n';
const CLOSE = '\n}}\n\\end{itemize}\n';

describe('formatSkills', () => {
  it('should render flat categories in insertion order', () => {
    const result = formatSkills({
      Languages: ['TypeScript', 'C#'],
      Tools: 'Docker, Git',
    });

    expect(result).toBe(
      OPEN +
        '\\textbf{Languages}: TypeScript, C\\# \\\\\n' +
        '\\textbf{Tools}: Docker, Git' +
        CLOSE,
    );
  });

  it('should emit nested Technical Skills groups first and without the parent label', () => {
    const result = formatSkills({
      Soft: ['Mentoring'],
      'Technical Skills': {
        Languages: ['Go', 'Rust'],
        Empty: [],
        Cloud: ['AWS'],
      },
    });

    expect(result).toBe(
      OPEN +
        '\\textbf{Languages}: Go, Rust \\\\\n' +
        '\\textbf{Cloud}: AWS \\\\\n' +
        '\\textbf{Soft}: Mentoring' +
        CLOSE,
    );
  });

  it('should render a Technical Skills list as a single labelled line', () => {
    expect(formatSkills({ 'Technical Skills': ['SQL'] })).toBe(
      OPEN + '\\textbf{Technical Skills}: SQL' + CLOSE,
    );
  });

  it('should prefix nested groups of other categories with the category label', () => {
    const result = formatSkills({
      Frameworks: { Backend: ['NestJS', 'Express'], Frontend: ['React'] },
    });

    expect(result).toBe(
      OPEN +
        '\\textbf{Frameworks}: \\textbf{Backend}: NestJS, Express \\\\\n' +
        '\\textbf{Frontend}: React' +
        CLOSE,
    );
  });

  it('should skip empty categories and nesting deeper than one level', () => {
    const result = formatSkills({
      Languages: [],
      Notes: '  ',
      Deep: { Inner: { TooDeep: ['x'] } },
      Tools: ['Git'],
    });

    expect(result).toBe(OPEN + '\\textbf{Tools}: Git' + CLOSE);
  });

  it('should bold only the label of legacy lines', () => {
    const result = formatSkills([
      'Languages: Python, C++: modern',
      'Team player & communicator',
    ]);

    expect(result).toBe(
      OPEN +
        '\\textbf{Languages}: Python, C++: modern \\\\\n' +
        'Team player \\& communicator' +
        CLOSE,
    );
  });

  it('should keep the itemize frame for absent input', () => {
    expect(formatSkills(undefined)).toBe(OPEN + CLOSE);
  });
});
