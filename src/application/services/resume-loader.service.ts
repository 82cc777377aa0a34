import { Inject, Injectable } from '@nestjs/common';
import { promises as fs } from 'fs';
import {
  isErrnoException,
  RenderingError,
  ResumeParseError,
} from '../../domain/errors/rendering.errors';
import { isRecord } from '../../domain/services/section-shapes';
import { ResumeRecord } from '../../domain/types/resume.types';
import { ILoggerPort } from '../ports/logger.port';

const ENVELOPE_KEY = 'customized_resume';

@Injectable()
export class ResumeLoader {
  constructor(
    @Inject('ILoggerPort')
    private readonly logger: ILoggerPort,
  ) {}

  /**
   * Parses résumé JSON. Generated documents sometimes lose their opening
   * brace, so one is restored, and a `customized_resume` envelope is
   * unwrapped.
   */
  parse(text: string): ResumeRecord {
    let content = text.trim();
    if (!content.startsWith('{')) {
      this.logger.debug('Resume JSON lacks an opening brace, adding one', ResumeLoader.name);
      content = `{${content}`;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ResumeParseError(`Error parsing resume JSON: ${detail}`, error);
    }

    if (!isRecord(data)) {
      throw new ResumeParseError('Resume JSON must be an object');
    }
    if (!(ENVELOPE_KEY in data)) return data;

    const inner = data[ENVELOPE_KEY];
    if (!isRecord(inner)) {
      throw new ResumeParseError(`"${ENVELOPE_KEY}" must be an object`);
    }
    return inner;
  }

  async load(filePath: string): Promise<ResumeRecord> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ResumeParseError(`Resume JSON file not found: ${filePath}`, error);
      }
      throw new RenderingError(`Could not read resume JSON: ${filePath}`, error);
    }
    return this.parse(text);
  }
}
