import type { BibEntryNode, ParagraphNode, PersonName, SectionNode } from '../tei/types.js';

export type BibIndex = ReadonlyMap<string, BibEntryNode>;

const COMMON_SECTION_TITLES = new Set([
  'abstract',
  'introduction',
  'background',
  'related work',
  'material and methods',
  'materials and methods',
  'methods',
  'results',
  'discussion',
  'conclusion',
  'conclusions',
]);

const BACK_MATTER_KEYWORDS = [
  'acknowledgement',
  'acknowledgment',
  'conflict of interest',
  'funding',
  'author contribution',
  'competing interests',
  'supplementary material',
  'supplementary information',
  'additional information',
  'data availability',
  'appendix',
];

const BIB_REF_OPEN = '[bib_ref]';
const BIB_REF_CLOSE = '[/bib_ref]';

// "(Fig. " or "(see Table " left in front of a figure/table pointer
const OPEN_POINTER_LEAD = /\s*\(\s*(?:see\s+)?(?:figures?|figs?\.?|tables?)\s*$/i;
const BARE_POINTER_LEAD = /\s*(?:figures?|figs?\.?|tables?)\s*$/i;
const POINTER_CONNECTOR = /^\s*(?:,|;|and|&|-|–)\s*$/i;
const SUPPLEMENTARY_MENTION = /\s*\(\s*(?:see\s+)?supplementary[^()]*\)/gi;

export function formatName(name: PersonName): string {
  return [...name.forenames, name.surname].filter((part) => part.length > 0).join(' ');
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function plainText(paragraph: ParagraphNode): string {
  return collapseWhitespace(paragraph.segments.map((segment) => segment.text).join(''));
}

/**
 * Renders a body paragraph: resolved citations are expanded inline,
 * figure/table pointers are dropped along with their lead-in words.
 */
export function renderParagraph(paragraph: ParagraphNode, bibIndex: BibIndex): string {
  let content = '';
  let closingParenPending = false;

  for (const segment of paragraph.segments) {
    switch (segment.type) {
      case 'text': {
        let value = segment.text;
        if (closingParenPending) {
          if (POINTER_CONNECTOR.test(value)) continue;
          value = value.replace(/^\s*\)/, '');
          closingParenPending = false;
        }
        content += value;
        break;
      }
      case 'citation': {
        const entry = bibIndex.get(segment.target);
        if (!entry) {
          content += segment.text;
          break;
        }
        const firstAuthor = entry.authors[0] ? formatName(entry.authors[0]) : '';
        if (content && !/\s$/.test(content)) content += ' ';
        content += `${BIB_REF_OPEN} ${entry.title}, ${firstAuthor} ${BIB_REF_CLOSE}`;
        break;
      }
      case 'pointer': {
        if (OPEN_POINTER_LEAD.test(content)) {
          content = content.replace(OPEN_POINTER_LEAD, '');
          closingParenPending = true;
        } else if (!closingParenPending) {
          content = content.replace(BARE_POINTER_LEAD, '');
        }
        break;
      }
    }
  }

  return collapseWhitespace(content.replace(SUPPLEMENTARY_MENTION, ''));
}

export function isBackMatter(section: SectionNode): boolean {
  const heading = section.heading.toLowerCase();
  return BACK_MATTER_KEYWORDS.some((keyword) => heading.includes(keyword));
}

export function renderHeading(section: SectionNode): string {
  if (!section.heading) return '';
  const marker = COMMON_SECTION_TITLES.has(section.heading.toLowerCase()) ? '#' : '##';
  const label = section.number ? `${section.number} ${section.heading}` : section.heading;
  return `${marker} ${label}`;
}

export function renderSection(section: SectionNode, bibIndex: BibIndex): string {
  const lines = [
    renderHeading(section),
    ...section.paragraphs.map((paragraph) => renderParagraph(paragraph, bibIndex)),
  ];
  return lines.filter((line) => line.length > 0).join('\n');
}
