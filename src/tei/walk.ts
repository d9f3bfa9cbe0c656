import type {
  AbstractNode,
  AuthorNode,
  BibEntryNode,
  ParagraphNode,
  SectionNode,
  TeiNode,
  TitleNode,
} from './types.js';

export type ParagraphParent = AbstractNode | SectionNode | null;

/**
 * One optional callback per node kind. Returning `false` from any callback
 * stops the walk.
 */
export interface TeiVisitor {
  title?(node: TitleNode): void | false;
  author?(node: AuthorNode): void | false;
  abstract?(node: AbstractNode): void | false;
  section?(node: SectionNode): void | false;
  paragraph?(node: ParagraphNode, parent: ParagraphParent): void | false;
  bibEntry?(node: BibEntryNode): void | false;
}

function assertNever(node: never): never {
  throw new Error(`Unhandled TEI node: ${JSON.stringify(node)}`);
}

function visitParagraphs(parent: AbstractNode | SectionNode, visitor: TeiVisitor): boolean {
  for (const paragraph of parent.paragraphs) {
    if (visitor.paragraph?.(paragraph, parent) === false) return false;
  }
  return true;
}

function visit(node: TeiNode, visitor: TeiVisitor): boolean {
  switch (node.kind) {
    case 'title':
      return visitor.title?.(node) !== false;
    case 'author':
      return visitor.author?.(node) !== false;
    case 'abstract':
      return visitor.abstract?.(node) !== false && visitParagraphs(node, visitor);
    case 'section':
      return visitor.section?.(node) !== false && visitParagraphs(node, visitor);
    case 'paragraph':
      return visitor.paragraph?.(node, null) !== false;
    case 'bibEntry':
      return visitor.bibEntry?.(node) !== false;
    default:
      return assertNever(node);
  }
}

/** Visits nodes in document order, descending into abstract and section paragraphs. */
export function walkTei(nodes: readonly TeiNode[], visitor: TeiVisitor): void {
  for (const node of nodes) {
    if (!visit(node, visitor)) return;
  }
}
