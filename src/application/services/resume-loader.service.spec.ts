import { Test, TestingModule } from '@nestjs/testing';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ResumeLoader } from './resume-loader.service';
import {
  RenderingError,
  ResumeParseError,
} from '../../domain/errors/rendering.errors';
import { createMockLogger } from '../../test-utils/logger.mock';

describe('ResumeLoader', () => {
  let loader: ResumeLoader;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ResumeLoader,
        { provide: 'ILoggerPort', useValue: createMockLogger() },
      ],
    }).compile();

    loader = module.get<ResumeLoader>(ResumeLoader);
  });

  describe('parse', () => {
    it('should parse a plain record', () => {
      expect(loader.parse('{"personal_info": {"name": "Jane Doe"}}')).toEqual({
        personal_info: { name: 'Jane Doe' },
      });
    });

    it('should restore a missing opening brace', () => {
      expect(loader.parse('  "skills": ["Languages: Go"]}\n')).toEqual({
        skills: ['Languages: Go'],
      });
    });

    it('should unwrap the customized_resume envelope', () => {
      const text = JSON.stringify({
        customized_resume: { experience: [] },
        notes: 'ignored',
      });
      expect(loader.parse(text)).toEqual({ experience: [] });
    });

    it('should reject malformed JSON', () => {
      expect(() => loader.parse('{"a": ')).toThrow(ResumeParseError);
    });

    it('should reject a non-object envelope', () => {
      expect(() => loader.parse('{"customized_resume": "text"}')).toThrow(
        '"customized_resume" must be an object',
      );
    });
  });

  describe('load', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'resume-loader-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should read and parse a file', async () => {
      const file = path.join(dir, 'resume.json');
      await fs.writeFile(file, '{"customized_resume": {"projects": []}}');

      await expect(loader.load(file)).resolves.toEqual({ projects: [] });
    });

    it('should report a missing file as a parse error', async () => {
      const file = path.join(dir, 'missing.json');

      await expect(loader.load(file)).rejects.toThrow(
        new ResumeParseError(`Resume JSON file not found: ${file}`),
      );
    });

    it('should wrap other read failures', async () => {
      await expect(loader.load(dir)).rejects.toBeInstanceOf(RenderingError);
    });
  });
});
