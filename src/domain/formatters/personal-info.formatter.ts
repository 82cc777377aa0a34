import {
  CONTACT_SEPARATOR,
  PLACEHOLDER_CONTACT,
  PLACEHOLDER_NAME,
} from '../constants/latex.constants';
import {
  classifyContact,
  digitsOf,
  ensureProtocol,
  escapeLatex,
} from '../services/latex-text';
import { inspectPersonalInfo } from '../services/section-shapes';
import { ContactDetails } from '../types/resume.types';

function headerBlock(name: string, contactLine: string): string {
  return `\\begin{center}
\\textbf{\\Huge \\scshape ${name}} \\\\ \\vspace{1pt}
\\small ${contactLine}
\\end{center}`;
}

function phoneLink(phone: string): string {
  const trimmed = phone.trim();
  const target = `${trimmed.startsWith('+') ? '+' : ''}${digitsOf(trimmed)}`;
  return `\\href{tel:${target}}{${escapeLatex(trimmed)}}`;
}

function emailLink(email: string): string {
  const escaped = escapeLatex(email.trim());
  return `\\href{mailto:${escaped}}{\\underline{${escaped}}}`;
}

function profileLink(url: string): string {
  const escaped = escapeLatex(url.trim());
  return `\\href{${ensureProtocol(escaped)}}{\\underline{${escaped}}}`;
}

function contactItem(segment: string): string {
  switch (classifyContact(segment)) {
    case 'email':
      return emailLink(segment);
    case 'linkedin':
    case 'github':
      return profileLink(segment);
    case 'phone':
      return phoneLink(segment);
    case 'text':
      return escapeLatex(segment);
  }
}

function formatStructured(contact: ContactDetails): string {
  const items: string[] = [];
  if (contact.phone) items.push(phoneLink(contact.phone));
  if (contact.email) items.push(emailLink(contact.email));
  if (contact.linkedin) items.push(profileLink(contact.linkedin));
  if (contact.github) items.push(profileLink(contact.github));

  return headerBlock(
    escapeLatex(contact.name ?? PLACEHOLDER_NAME),
    items.join(CONTACT_SEPARATOR),
  );
}

// "Jane Doe Senior Engineer | jane@x.com | ..." keeps only "Jane Doe".
function formatLegacy(text: string): string {
  const [head = '', ...segments] = text.trim().split('|');
  const nameTokens = head.trim().split(/\s+/).filter(Boolean);
  const name =
    nameTokens.length >= 2 ? nameTokens.slice(0, 2).join(' ') : head.trim();

  const items = segments
    .map((segment) => segment.trim())
    .filter((segment) => segment !== '')
    .map(contactItem);

  return headerBlock(
    escapeLatex(name || PLACEHOLDER_NAME),
    items.join(CONTACT_SEPARATOR),
  );
}

export function formatPersonalInfo(raw: unknown): string {
  const shape = inspectPersonalInfo(raw);
  switch (shape.kind) {
    case 'structured':
      return formatStructured(shape.contact);
    case 'legacy':
      return formatLegacy(shape.text);
    case 'absent':
      return headerBlock(PLACEHOLDER_NAME, PLACEHOLDER_CONTACT);
  }
}
