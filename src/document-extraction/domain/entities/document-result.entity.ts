export interface DocumentChunk {
  chunkId?: string;
  content?: string;
}

export interface LayoutTextBlock {
  text?: string;
  type?: string; // paragraph, heading-1, ...
}

export interface LayoutBlock {
  blockId?: string;
  textBlock?: LayoutTextBlock;
}

/**
 * Structured result of a Document AI call.
 *
 * Representations are listed in descending fidelity: the flat text, the
 * chunked document produced by layout chunking, and the layout blocks.
 * Any of them may be absent.
 */
export interface DocumentResult {
  text?: string;
  chunkedDocument?: {
    chunks: DocumentChunk[];
  };
  documentLayout?: {
    blocks: LayoutBlock[];
  };
  pageCount: number;
}
