import { formatPersonalInfo } from './personal-info.formatter';

const header = (name: string, contact: string) =>
  `\\begin{center}\n\\textbf{\\Huge \\scshape ${name}} \\\\ \\vspace{1pt}\n\\small ${contact}\n\\end{center}`;

describe('formatPersonalInfo', () => {
  it('should render structured contact fields in phone, email, linkedin, github order', () => {
    const result = formatPersonalInfo({
      github: 'github.com/janedoe',
      linkedin: 'linkedin.com/in/janedoe',
      email: 'jane@example.com',
      phone: '555-123-4567',
      name: 'Jane Doe',
    });

    expect(result).toBe(
      header(
        'Jane Doe',
        [
          '\\href{tel:5551234567}{555-123-4567}',
          '\\href{mailto:jane@example.com}{\\underline{jane@example.com}}',
          '\\href{https://linkedin.com/in/janedoe}{\\underline{linkedin.com/in/janedoe}}',
          '\\href{https://github.com/janedoe}{\\underline{github.com/janedoe}}',
        ].join(' $|$ '),
      ),
    );
  });

  it('should skip absent and null fields', () => {
    const result = formatPersonalInfo({
      name: 'Jane Doe',
      email: 'jane@x.com',
      phone: null,
      github: '',
    });

    expect(result).toBe(
      header('Jane Doe', '\\href{mailto:jane@x.com}{\\underline{jane@x.com}}'),
    );
  });

  it('should escape special characters in structured values', () => {
    const result = formatPersonalInfo({
      name: 'Ana_Lee & Co',
      email: 'ana_lee@example.com',
    });

    expect(result).toContain('\\scshape Ana\\_Lee \\& Co}');
    expect(result).toContain(
      '\\href{mailto:ana\\_lee@example.com}{\\underline{ana\\_lee@example.com}}',
    );
  });

  it('should keep a leading plus in the tel target', () => {
    const result = formatPersonalInfo({ name: 'Jane', phone: '+1 (555) 123-4567' });
    expect(result).toContain('\\href{tel:+15551234567}{+1 (555) 123-4567}');
  });

  it('should fall back to the placeholder name when a structured record has none', () => {
    expect(formatPersonalInfo({ email: 'jane@x.com' })).toContain(
      '\\scshape Your Name}',
    );
  });

  it('should parse the legacy pipe-separated string', () => {
    const result = formatPersonalInfo(
      'Jane Doe Software Engineer | jane@x.com | linkedin.com/in/jane | github.com/jane | (555) 123-4567 | Springfield, IL',
    );

    expect(result).toBe(
      header(
        'Jane Doe',
        [
          '\\href{mailto:jane@x.com}{\\underline{jane@x.com}}',
          '\\href{https://linkedin.com/in/jane}{\\underline{linkedin.com/in/jane}}',
          '\\href{https://github.com/jane}{\\underline{github.com/jane}}',
          '\\href{tel:5551234567}{(555) 123-4567}',
          'Springfield, IL',
        ].join(' $|$ '),
      ),
    );
  });

  it('should keep a single-word legacy name and drop empty segments', () => {
    const result = formatPersonalInfo('Prince | | prince@x.com');
    expect(result).toBe(
      header('Prince', '\\href{mailto:prince@x.com}{\\underline{prince@x.com}}'),
    );
  });

  it('should return the placeholder block for absent or unrecognised input', () => {
    const placeholder = header(
      'Your Name',
      'phone $|$ email $|$ linkedin $|$ github',
    );
    expect(formatPersonalInfo(undefined)).toBe(placeholder);
    expect(formatPersonalInfo(42)).toBe(placeholder);
    expect(formatPersonalInfo('   ')).toBe(placeholder);
    expect(formatPersonalInfo(['Jane'])).toBe(placeholder);
  });
});
