import { Injectable } from '@nestjs/common';
import {
  ORPHAN_BOILERPLATE_PATTERN,
  TEMPLATE_REGIONS,
  TemplateRegion,
} from '../constants/latex.constants';
import { SECTION_FORMATTERS } from '../formatters';
import { ResumeRecord, SectionKey } from '../types/resume.types';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function regionPattern(region: TemplateRegion): RegExp {
  const begin = region.begin.map(escapeRegExp).join('\\s*');
  return new RegExp(`${begin}[\\s\\S]*?${escapeRegExp(region.end)}`, 'g');
}

@Injectable()
export class TemplatePopulator {
  /**
   * Replaces every known region whose section is present in the record.
   * Regions missing from the template are left alone; a record with no
   * known section returns the template untouched.
   */
  populate(template: string, record: ResumeRecord): string {
    const sections = TEMPLATE_REGIONS.filter(
      (region) => record[region.section] !== undefined,
    );
    if (sections.length === 0) return template;

    let populated = template;
    for (const region of sections) {
      const markup = SECTION_FORMATTERS[region.section](record[region.section]);
      // A callback keeps `$&` and friends in the markup literal.
      populated = populated.replace(regionPattern(region), () => markup);
    }

    return populated.replace(ORPHAN_BOILERPLATE_PATTERN, '');
  }

  /** Sections whose markers appear in the template. */
  findRegions(template: string): SectionKey[] {
    return TEMPLATE_REGIONS.filter((region) =>
      regionPattern(region).test(template),
    ).map((region) => region.section);
  }
}
