import { Block, BlockType } from "../domain/types.js";

const COMMENT_BLOCK_PATTERN = /(\/\*[\s\S]*?\*\/)/;

const BLOCK_KEYWORDS: Array<[keyword: string, type: BlockType]> = [
  ["create table", "schema"],
  ["column comments:", "columns"],
  ["rows from", "samples"],
];

/**
 * Splits raw table info into comment blocks and the text between them.
 *
 * Comment blocks come back unwrapped: `/*` and `*\/` are dropped and the body
 * is trimmed. Blocks keep their source order.
 */
export function detectBlocks(text: string): Block[] {
  const segments = text.split(COMMENT_BLOCK_PATTERN);
  const blocks: Block[] = [];

  segments.forEach((segment, position) => {
    if (!segment.trim()) {
      return;
    }

    // split() with a capture group puts the captured delimiters at odd positions
    const isComment = position % 2 === 1;
    const body = isComment ? unwrapComment(segment) : segment.trim();
    if (!body) {
      return;
    }

    blocks.push({ text: body, type: classifyBlock(segment) });
  });

  return blocks;
}

export function classifyBlock(text: string): BlockType {
  const lower = text.toLowerCase();
  for (const [keyword, type] of BLOCK_KEYWORDS) {
    if (lower.includes(keyword)) {
      return type;
    }
  }
  return "general";
}

function unwrapComment(segment: string): string {
  return segment.slice(2, -2).trim();
}
