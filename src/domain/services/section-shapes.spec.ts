import {
  inspectEducation,
  inspectExperience,
  inspectPersonalInfo,
  inspectProjects,
  inspectSkills,
  toDetailList,
} from './section-shapes';

describe('section shapes', () => {
  describe('toDetailList', () => {
    it('should drop blank items and coerce the rest', () => {
      expect(toDetailList(['a', '  ', null, 3])).toEqual(['a', '3']);
    });

    it('should wrap a lone string and ignore other values', () => {
      expect(toDetailList('Shipped v2')).toEqual(['Shipped v2']);
      expect(toDetailList(' ')).toEqual([]);
      expect(toDetailList({ a: 1 })).toEqual([]);
    });
  });

  describe('inspectPersonalInfo', () => {
    it('should trim structured fields and treat blanks as missing', () => {
      expect(
        inspectPersonalInfo({ name: ' Jane ', email: '', phone: 5551234567 }),
      ).toEqual({
        kind: 'structured',
        contact: {
          name: 'Jane',
          email: undefined,
          phone: '5551234567',
          linkedin: undefined,
          github: undefined,
        },
      });
    });

    it('should recognise legacy strings and absent values', () => {
      expect(inspectPersonalInfo('Jane | a@b.com')).toEqual({
        kind: 'legacy',
        text: 'Jane | a@b.com',
      });
      expect(inspectPersonalInfo('')).toEqual({ kind: 'absent' });
      expect(inspectPersonalInfo(null)).toEqual({ kind: 'absent' });
    });
  });

  describe('inspectEducation', () => {
    it('should keep only object entries and fill missing fields with empty text', () => {
      expect(inspectEducation([{ institution: 'MIT' }, 'junk', 7])).toEqual({
        kind: 'structured',
        entries: [
          {
            institution: 'MIT',
            location: '',
            degree: '',
            dates: '',
            details: [],
          },
        ],
      });
    });

    it('should treat a free-text paragraph as legacy', () => {
      expect(inspectEducation('Stanford University').kind).toBe('legacy');
      expect(inspectEducation(undefined).kind).toBe('absent');
    });
  });

  describe('inspectExperience', () => {
    it('should never yield null-like text for missing fields', () => {
      const shape = inspectExperience([{ company: 'Acme', title: null }]);
      expect(shape).toEqual({
        kind: 'structured',
        entries: [
          { company: 'Acme', title: '', location: '', dates: '', details: [] },
        ],
      });
    });

    it('should be absent for non-list input', () => {
      expect(inspectExperience('Acme')).toEqual({ kind: 'absent' });
    });
  });

  describe('inspectProjects', () => {
    it('should prefer technologies_used and join list technologies', () => {
      const shape = inspectProjects([
        {
          title: 'Tracker',
          technologies: 'ignored',
          technologies_used: ['Go', '', 'Redis'],
          details: ['Built it'],
        },
      ]);
      expect(shape).toEqual({
        kind: 'structured',
        entries: [
          { name: 'Tracker', technologies: 'Go, Redis', details: ['Built it'] },
        ],
      });
    });

    it('should fall back to description when details are empty', () => {
      const shape = inspectProjects([
        { name: 'Site', technologies: 'Vue', details: [], description: 'A site' },
      ]);
      expect(shape).toEqual({
        kind: 'structured',
        entries: [{ name: 'Site', technologies: 'Vue', details: ['A site'] }],
      });
    });
  });

  describe('inspectSkills', () => {
    it('should classify list, text and nested categories', () => {
      const shape = inspectSkills({
        Languages: ['TypeScript', 'Go'],
        Tools: 'Docker',
        Frameworks: { Backend: ['NestJS'], Frontend: 'React', Deep: { x: ['y'] } },
      });

      expect(shape).toEqual({
        kind: 'structured',
        categories: [
          { label: 'Languages', value: { kind: 'list', items: ['TypeScript', 'Go'] } },
          { label: 'Tools', value: { kind: 'text', text: 'Docker' } },
          {
            label: 'Frameworks',
            value: {
              kind: 'nested',
              groups: [
                { label: 'Backend', items: ['NestJS'] },
                { label: 'Frontend', items: ['React'] },
              ],
            },
          },
        ],
      });
    });

    it('should treat a list of lines as legacy', () => {
      expect(inspectSkills(['Languages: Go', ''])).toEqual({
        kind: 'legacy',
        lines: ['Languages: Go'],
      });
      expect(inspectSkills('Go')).toEqual({ kind: 'absent' });
    });
  });
});
