export interface PersonName {
  /** Forenames in document order (first, then middle). */
  forenames: string[];
  surname: string;
}

export type Segment =
  | { type: 'text'; text: string }
  /** `ref[@type=bibr]`; `target` is the referenced entry id without '#'. */
  | { type: 'citation'; target: string; text: string }
  /** Any other typed `ref`: figure, table, formula, foot. */
  | { type: 'pointer'; refType: string; text: string };

export interface TitleNode {
  kind: 'title';
  text: string;
}

export interface AuthorNode {
  kind: 'author';
  name: PersonName;
}

export interface ParagraphNode {
  kind: 'paragraph';
  segments: Segment[];
}

export interface AbstractNode {
  kind: 'abstract';
  paragraphs: ParagraphNode[];
}

export interface SectionNode {
  kind: 'section';
  heading: string;
  /** Section number from `head/@n`, when present. */
  number?: string;
  paragraphs: ParagraphNode[];
}

export interface BibEntryNode {
  kind: 'bibEntry';
  id: string;
  title: string;
  authors: PersonName[];
  venue: string;
  year: string;
}

export type TeiNode = TitleNode | AuthorNode | AbstractNode | SectionNode | ParagraphNode | BibEntryNode;

export interface TeiMeta {
  language: string;
  publisher: string;
  journal: string;
  releaseYear: string;
  doi: string;
}

export interface TeiDocument {
  meta: TeiMeta;
  /** Document order: header nodes, then body sections, then bibliography. */
  nodes: TeiNode[];
}
