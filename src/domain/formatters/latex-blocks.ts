// Building blocks shared by the section formatters. Arguments are already
// escaped markup.

export function openSubHeadingList(title: string): string {
  return `\\section{${title}}\n\\resumeSubHeadingListStart\n`;
}

export const CLOSE_SUBHEADING_LIST = '\\resumeSubHeadingListEnd\n';

export function subheading(
  topLeft: string,
  topRight: string,
  bottomLeft: string,
  bottomRight: string,
): string {
  return `\\resumeSubheading\n{${topLeft}}{${topRight}}\n{${bottomLeft}}{${bottomRight}}\n`;
}

export function projectHeading(heading: string): string {
  return `\\resumeProjectHeading\n{${heading}}{}\n`;
}

/** An itemize with no \item does not compile, so no items means no list. */
export function itemList(items: readonly string[]): string {
  if (items.length === 0) return '';
  const body = items.map((item) => `\\resumeItem{${item}}\n`).join('');
  return `\\resumeItemListStart\n${body}\\resumeItemListEnd\n`;
}
