import type {
  BookItem,
  BookPartItem,
  ContextBlock,
  HeaderBlock,
  LayoutBlock,
  LilyPondFile,
  MidiBlock,
  PaperBlock,
  ScoreItem,
  ToplevelExpression
} from '../core/ast.js';
import { formatAssignment, formatContextModItem, formatMusic, type MusicWriter } from './serialize-music.js';
import { DUTCH_SPELLING, type PitchSpelling } from './spelling.js';
import { quote } from './text.js';

/** Serializer formatting options. */
export interface SerializeOptions {
  /** One indentation step for block contents. Defaults to two spaces. */
  indent?: string;
  /** Alteration suffix table. Defaults to Dutch names. */
  spelling?: PitchSpelling;
}

interface BlockWriter extends MusicWriter {
  indent: string;
}

type BlockItem = ToplevelExpression | ScoreItem | BookItem | BookPartItem;

/**
 * Render a file as canonical LilyPond text: the version line first, then each
 * top-level item separated by a blank line. Output ends with a newline.
 */
export function serialize(file: LilyPondFile, options: SerializeOptions = {}): string {
  const writer: BlockWriter = {
    indent: options.indent ?? '  ',
    spelling: options.spelling ?? DUTCH_SPELLING
  };

  const sections: string[] = [];
  if (file.version !== undefined) {
    sections.push(`\\version ${quote(file.version)}`);
  }
  for (const item of file.items) {
    sections.push(formatItem(item, writer, 0));
  }
  return sections.length === 0 ? '' : `${sections.join('\n\n')}\n`;
}

/** `\keyword {` ... `}` with one item per line, or `\keyword { }` when empty. */
function block(keyword: string, lines: readonly string[], writer: BlockWriter, depth: number): string {
  if (lines.length === 0) {
    return `\\${keyword} { }`;
  }
  const pad = writer.indent.repeat(depth);
  const inner = writer.indent.repeat(depth + 1);
  return [`\\${keyword} {`, ...lines.map((line) => inner + line), `${pad}}`].join('\n');
}

function formatItem(item: BlockItem, writer: BlockWriter, depth: number): string {
  switch (item.kind) {
    case 'score':
    case 'book':
    case 'bookpart': {
      const children: readonly BlockItem[] = item.items;
      const lines = children.map((child) => formatItem(child, writer, depth + 1));
      return block(item.kind, lines, writer, depth);
    }
    case 'header':
      return formatHeader(item, writer, depth);
    case 'paper':
      return formatPaper(item, writer, depth);
    case 'layout':
    case 'midi':
      return formatOutputDef(item, writer, depth);
    case 'assignment':
      return formatAssignment(item, writer);
    case 'music':
      return formatMusic(item.music, writer);
    case 'markup':
    case 'markuplist':
      return `\\${item.kind} ${item.markup.raw}`;
    case 'scheme':
      return `#${item.text}`;
  }
}

function formatHeader(header: HeaderBlock, writer: BlockWriter, depth: number): string {
  return block(
    'header',
    header.fields.map((field) => formatAssignment(field, writer)),
    writer,
    depth
  );
}

function formatPaper(paper: PaperBlock, writer: BlockWriter, depth: number): string {
  const lines = paper.items.map((item) => (item.kind === 'scheme' ? `#${item.text}` : formatAssignment(item, writer)));
  return block('paper', lines, writer, depth);
}

function formatOutputDef(def: LayoutBlock | MidiBlock, writer: BlockWriter, depth: number): string {
  const lines = def.items.map((item) => {
    switch (item.kind) {
      case 'contextBlock':
        return formatContextBlock(item, writer, depth + 1);
      case 'scheme':
        return `#${item.text}`;
      case 'assignment':
        return formatAssignment(item, writer);
    }
  });
  return block(def.kind, lines, writer, depth);
}

function formatContextBlock(contextBlock: ContextBlock, writer: BlockWriter, depth: number): string {
  const lines = contextBlock.items.map((item) => formatContextModItem(item, writer));
  return block('context', lines, writer, depth);
}
