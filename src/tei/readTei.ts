import { FormatError } from '../errors.js';
import {
  attr,
  childElements,
  findAll,
  findFirst,
  firstChild,
  parseXmlTree,
  textContent,
  type XmlElement,
} from './xmlTree.js';
import type {
  AbstractNode,
  AuthorNode,
  BibEntryNode,
  ParagraphNode,
  PersonName,
  SectionNode,
  Segment,
  TeiDocument,
  TeiMeta,
  TeiNode,
} from './types.js';

const emptyElement: XmlElement = { type: 'element', name: '', attributes: {}, children: [] };

function text(element: XmlElement | undefined): string {
  return textContent(element).trim();
}

function hasType(value: string): (el: XmlElement) => boolean {
  return (el) => (attr(el, 'type') ?? '').toLowerCase() === value.toLowerCase();
}

function yearOf(value: string | undefined): string {
  if (!value) return '';
  return /\d{4}/.exec(value)?.[0] ?? '';
}

function dateYear(date: XmlElement | undefined): string {
  if (!date) return '';
  return yearOf(attr(date, 'when')) || yearOf(textContent(date));
}

export function readPersonName(persName: XmlElement | undefined): PersonName | undefined {
  if (!persName) return undefined;
  const forenames = childElements(persName, 'forename').map(text).filter((name) => name.length > 0);
  const surnameEl = firstChild(persName, 'surname');
  const surname = surnameEl ? text(surnameEl) : forenames.length === 0 ? text(persName) : '';
  if (forenames.length === 0 && !surname) return undefined;
  return { forenames, surname };
}

function readAuthors(container: XmlElement | undefined): PersonName[] {
  const names: PersonName[] = [];
  for (const author of childElements(container, 'author')) {
    const name = readPersonName(firstChild(author, 'persName'));
    if (name) names.push(name);
  }
  return names;
}

function readSegments(element: XmlElement): Segment[] {
  const segments: Segment[] = [];
  for (const child of element.children) {
    if (child.type === 'text') {
      segments.push({ type: 'text', text: child.text });
      continue;
    }
    if (child.name === 'ref') {
      const refType = attr(child, 'type');
      const target = attr(child, 'target');
      if (refType === 'bibr' && target) {
        segments.push({ type: 'citation', target: target.replace(/^#/, ''), text: textContent(child) });
      } else if (refType && refType !== 'bibr') {
        segments.push({ type: 'pointer', refType, text: textContent(child) });
      } else {
        segments.push({ type: 'text', text: textContent(child) });
      }
      continue;
    }
    // <s>, <hi>, inline <formula>: keep their content in place
    segments.push(...readSegments(child));
  }
  return segments;
}

export function readParagraph(p: XmlElement): ParagraphNode {
  return { kind: 'paragraph', segments: readSegments(p) };
}

function readSection(div: XmlElement, paragraphs: XmlElement[]): SectionNode | undefined {
  const head = firstChild(div, 'head');
  const heading = text(head);
  if (!heading && paragraphs.length === 0) return undefined;
  const section: SectionNode = { kind: 'section', heading, paragraphs: paragraphs.map(readParagraph) };
  const number = head ? attr(head, 'n') : undefined;
  if (number) section.number = number;
  return section;
}

function isBibliographyDiv(div: XmlElement): boolean {
  return hasType('references')(div) || firstChild(div, 'listBibl') !== undefined;
}

/**
 * Leaf divisions become sections. Paragraphs sitting directly in the
 * container are gathered into an unnamed section at their position.
 */
function collectSections(container: XmlElement, into: SectionNode[]): void {
  let loose: XmlElement[] = [];
  const flushLoose = () => {
    if (loose.length === 0) return;
    const section = readSection(emptyElement, loose);
    if (section) into.push(section);
    loose = [];
  };

  for (const child of childElements(container)) {
    if (child.name === 'p') {
      loose.push(child);
      continue;
    }
    if (child.name !== 'div' || isBibliographyDiv(child)) continue;
    flushLoose();

    const ownParagraphs = childElements(child, 'p');
    const nested = childElements(child, 'div');
    if (nested.length === 0 || ownParagraphs.length > 0 || firstChild(child, 'head')) {
      const section = readSection(child, ownParagraphs);
      if (section) into.push(section);
    }
    if (nested.length > 0) {
      collectSections(child, into);
    }
  }
  flushLoose();
}

export function readBibEntry(bibl: XmlElement): BibEntryNode {
  const analytic = firstChild(bibl, 'analytic');
  const monogr = firstChild(bibl, 'monogr');
  const monogrTitles = childElements(monogr, 'title');

  const articleTitle = text(firstChild(analytic, 'title'));
  let title: string;
  let venue: string;
  if (articleTitle) {
    title = articleTitle;
    venue = text(monogrTitles[0]);
  } else {
    const book = monogrTitles.find((el) => attr(el, 'level') === 'm') ?? monogrTitles[0];
    title = text(book);
    venue = text(monogrTitles.find((el) => el !== book));
  }

  const analyticAuthors = readAuthors(analytic);
  return {
    kind: 'bibEntry',
    id: attr(bibl, 'id') ?? '',
    title,
    authors: analyticAuthors.length > 0 ? analyticAuthors : readAuthors(monogr),
    venue,
    year: dateYear(findFirst(monogr, 'date')),
  };
}

function readMeta(header: XmlElement | undefined): TeiMeta {
  const sourceDesc = findFirst(header, 'sourceDesc');
  const publicationStmt = findFirst(header, 'publicationStmt');
  const monogr = findFirst(sourceDesc, 'monogr');
  const journalTitle = firstChild(monogr, 'title', hasType('main')) ?? firstChild(monogr, 'title');

  return {
    language: header ? attr(header, 'lang') ?? '' : '',
    publisher: text(findFirst(firstChild(monogr, 'imprint'), 'publisher')) || text(firstChild(publicationStmt, 'publisher')),
    journal: text(journalTitle),
    releaseYear: dateYear(firstChild(publicationStmt, 'date')) || dateYear(findFirst(firstChild(monogr, 'imprint'), 'date')),
    doi: text(findFirst(header, 'idno', hasType('DOI'))),
  };
}

/**
 * Reads GROBID TEI markup into the typed document model. Only malformed
 * markup, or markup whose root is not TEI, raises (FormatError); every
 * missing element simply yields no node.
 */
export function readTeiDocument(markup: string, source?: string): TeiDocument {
  const root = parseXmlTree(markup, source);
  if (root.name !== 'TEI') {
    throw new FormatError(`Expected a TEI document but found <${root.name}>`, { source });
  }

  const header = firstChild(root, 'teiHeader');
  const body = firstChild(root, 'text');
  const nodes: TeiNode[] = [];

  const titleStmt = findFirst(header, 'titleStmt');
  const titleEl = firstChild(titleStmt, 'title', hasType('main')) ?? firstChild(titleStmt, 'title');
  if (titleEl) {
    nodes.push({ kind: 'title', text: textContent(titleEl) });
  }

  const analytic = firstChild(findFirst(findFirst(header, 'sourceDesc'), 'biblStruct'), 'analytic');
  for (const name of readAuthors(analytic)) {
    const author: AuthorNode = { kind: 'author', name };
    nodes.push(author);
  }

  const abstractEl = findFirst(firstChild(header, 'profileDesc'), 'abstract');
  if (abstractEl) {
    const paragraphs = findAll(abstractEl, 'p');
    const abstract: AbstractNode = {
      kind: 'abstract',
      paragraphs: paragraphs.length > 0
        ? paragraphs.map(readParagraph)
        : [{ kind: 'paragraph', segments: [{ type: 'text', text: textContent(abstractEl) }] }],
    };
    nodes.push(abstract);
  }

  const sections: SectionNode[] = [];
  for (const part of childElements(body).filter((el) => el.name === 'body' || el.name === 'back')) {
    collectSections(part, sections);
  }
  nodes.push(...sections);

  const listBibl = findFirst(body, 'listBibl');
  for (const bibl of childElements(listBibl, 'biblStruct')) {
    nodes.push(readBibEntry(bibl));
  }

  return { meta: readMeta(header), nodes };
}
