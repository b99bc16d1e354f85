/**
 * Separators tuned for table info text, coarsest first. The trailing empty
 * separator splits into single characters.
 */
export const SCHEMA_SEPARATORS: readonly string[] = [
  "\n\n/*\n",
  "\n*/\n\n/*\n",
  "\n*/\n",
  "\n\n",
  "\n",
  " ",
  "",
];

export interface RecursiveSplitOptions {
  chunkSize: number;
  chunkOverlap?: number;
  separators?: readonly string[];
}

/**
 * Splits `text` into parts of at most `chunkSize` characters, breaking on the
 * coarsest separator that keeps parts within bounds. A part can only exceed
 * the bound when it is a single character.
 *
 * Separators stay attached to the segment that follows them and parts are
 * not trimmed, so without overlap `parts.join("") === text`.
 */
export function splitTextRecursively(
  text: string,
  options: RecursiveSplitOptions,
): string[] {
  const { chunkSize } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const overlap = Math.min(Math.max(options.chunkOverlap ?? 0, 0), chunkSize - 1);
  const separators = options.separators ?? SCHEMA_SEPARATORS;
  const parts = splitWithSeparators(text, separators, chunkSize - overlap);

  return overlap > 0 ? applyOverlap(parts, overlap) : parts;
}

function splitWithSeparators(
  text: string,
  separators: readonly string[],
  maxChars: number,
): string[] {
  if (!text) {
    return [];
  }
  if (separators.length === 0) {
    return [text];
  }

  const [separator, ...finer] = separators;
  const parts: string[] = [];
  let pending: string[] = [];

  const flushPending = () => {
    if (pending.length > 0) {
      parts.push(...packSegments(pending, maxChars));
      pending = [];
    }
  };

  for (const segment of splitKeepingSeparator(text, separator)) {
    if (segment.length <= maxChars) {
      pending.push(segment);
      continue;
    }

    flushPending();
    if (finer.length > 0) {
      parts.push(...splitWithSeparators(segment, finer, maxChars));
    } else {
      parts.push(segment);
    }
  }

  flushPending();
  return parts;
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") {
    return Array.from(text);
  }

  const segments: string[] = [];
  let start = 0;
  let index = text.indexOf(separator);

  while (index !== -1) {
    if (index > start) {
      segments.push(text.slice(start, index));
    }
    start = index;
    index = text.indexOf(separator, index + separator.length);
  }

  segments.push(text.slice(start));
  return segments.filter((segment) => segment !== "");
}

/** Greedy left-to-right packing of segments that each fit on their own. */
function packSegments(segments: string[], maxChars: number): string[] {
  const packed: string[] = [];
  let current = "";

  for (const segment of segments) {
    if (current && current.length + segment.length > maxChars) {
      packed.push(current);
      current = "";
    }
    current += segment;
  }

  if (current) {
    packed.push(current);
  }
  return packed;
}

function applyOverlap(parts: string[], overlap: number): string[] {
  return parts.map((part, index) =>
    index === 0 ? part : `${parts[index - 1].slice(-overlap)}${part}`,
  );
}
