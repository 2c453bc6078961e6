export interface TextSplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

const DEFAULT_SEPARATORS = ['\n\n', '\n', ' ', ''];

/**
 * Recursive character text splitter
 *
 * Splits on the coarsest separator present in the text, merges neighbouring
 * pieces back up to `chunkSize` characters with up to `chunkOverlap`
 * characters carried into the next chunk, and recurses with finer
 * separators into pieces that are still too long. Separators are not kept.
 */
export class RecursiveTextSplitter {
  private chunkSize: number;
  private chunkOverlap: number;
  private separators: string[];

  constructor(options: TextSplitterOptions) {
    if (options.chunkOverlap >= options.chunkSize) {
      throw new Error(`Chunk overlap (${options.chunkOverlap}) must be smaller than chunk size (${options.chunkSize})`);
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  splitText(text: string): string[] {
    return this.split(text, this.separators);
  }

  private split(text: string, separators: string[]): string[] {
    const finalChunks: string[] = [];

    let separator = separators[separators.length - 1] ?? '';
    let nextSeparators: string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i];
      if (candidate === '') {
        separator = candidate;
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        nextSeparators = separators.slice(i + 1);
        break;
      }
    }

    const splits = text.split(separator).filter(piece => piece !== '');
    let goodSplits: string[] = [];

    for (const piece of splits) {
      if (piece.length < this.chunkSize) {
        goodSplits.push(piece);
        continue;
      }

      if (goodSplits.length > 0) {
        finalChunks.push(...this.mergeSplits(goodSplits, separator));
        goodSplits = [];
      }

      if (nextSeparators.length === 0) {
        finalChunks.push(piece);
      } else {
        finalChunks.push(...this.split(piece, nextSeparators));
      }
    }

    if (goodSplits.length > 0) {
      finalChunks.push(...this.mergeSplits(goodSplits, separator));
    }

    return finalChunks;
  }

  private mergeSplits(splits: string[], separator: string): string[] {
    const separatorLength = separator.length;
    const docs: string[] = [];
    const current: string[] = [];
    let total = 0;

    for (const piece of splits) {
      const length = piece.length;
      const joinCost = current.length > 0 ? separatorLength : 0;

      if (total + length + joinCost > this.chunkSize && current.length > 0) {
        const doc = joinChunk(current, separator);
        if (doc !== null) {
          docs.push(doc);
        }

        // Drop pieces from the front until what remains fits as overlap
        while (
          total > this.chunkOverlap ||
          (total > 0 && total + length + (current.length > 0 ? separatorLength : 0) > this.chunkSize)
        ) {
          const removed = current.shift();
          if (removed === undefined) {
            break;
          }
          total -= removed.length + (current.length > 0 ? separatorLength : 0);
        }
      }

      current.push(piece);
      total += length + (current.length > 1 ? separatorLength : 0);
    }

    const doc = joinChunk(current, separator);
    if (doc !== null) {
      docs.push(doc);
    }

    return docs;
  }
}

function joinChunk(pieces: string[], separator: string): string | null {
  const text = pieces.join(separator).trim();
  return text === '' ? null : text;
}
