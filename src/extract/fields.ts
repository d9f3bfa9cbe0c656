import { walkTei } from '../tei/walk.js';
import type { AbstractNode, BibEntryNode, SectionNode, TeiNode } from '../tei/types.js';
import { formatName, isBackMatter, plainText, renderSection, type BibIndex } from './render.js';
import { REFERENCE_FIELD_SEPARATOR, REFERENCE_SEPARATOR } from './types.js';

/** First title wins; trimmed, nothing else normalised. */
export function extractTitle(nodes: readonly TeiNode[]): string {
  let title = '';
  walkTei(nodes, {
    title(node) {
      title = node.text.trim();
      return false;
    },
  });
  return title;
}

export function extractAuthors(nodes: readonly TeiNode[]): string[] {
  const authors: string[] = [];
  walkTei(nodes, {
    author(node) {
      authors.push(formatName(node.name));
    },
  });
  return authors;
}

export function extractAbstract(nodes: readonly TeiNode[]): string {
  let first: AbstractNode | undefined;
  const paragraphs: string[] = [];
  walkTei(nodes, {
    abstract(node) {
      if (first) return false;
      first = node;
    },
    paragraph(node, parent) {
      if (parent !== null && parent === first) {
        const text = plainText(node);
        if (text) paragraphs.push(text);
      }
    },
  });
  return paragraphs.join('\n');
}

export function extractBibEntries(nodes: readonly TeiNode[]): BibEntryNode[] {
  const entries: BibEntryNode[] = [];
  walkTei(nodes, {
    bibEntry(node) {
      entries.push(node);
    },
  });
  return entries;
}

export function indexBibliography(entries: readonly BibEntryNode[]): BibIndex {
  const index = new Map<string, BibEntryNode>();
  for (const entry of entries) {
    if (entry.id && !index.has(entry.id)) index.set(entry.id, entry);
  }
  return index;
}

export function flattenReference(entry: BibEntryNode): string {
  return [entry.authors.map(formatName).join(', '), entry.title, entry.venue, entry.year].join(REFERENCE_FIELD_SEPARATOR);
}

export function flattenReferences(entries: readonly BibEntryNode[]): string {
  return entries.map(flattenReference).join(REFERENCE_SEPARATOR);
}

/**
 * Body text as markdown-ish sections, back matter (acknowledgements,
 * funding, appendices...) left out.
 */
export function renderSections(nodes: readonly TeiNode[], bibIndex: BibIndex): string {
  const sections: SectionNode[] = [];
  walkTei(nodes, {
    section(node) {
      if (!isBackMatter(node)) sections.push(node);
    },
  });
  return sections
    .map((section) => renderSection(section, bibIndex))
    .filter((rendered) => rendered.length > 0)
    .join('\n\n');
}
