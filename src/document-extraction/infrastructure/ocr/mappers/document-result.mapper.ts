import { protos } from '@google-cloud/documentai';
import {
  DocumentChunk,
  DocumentResult,
  LayoutBlock,
} from '../../../domain/entities/document-result.entity';

type DocumentProto = protos.google.cloud.documentai.v1.IDocument;

function optional(value: string | null | undefined): string | undefined {
  return value ?? undefined;
}

export class DocumentResultMapper {
  /**
   * Maps the Document AI proto into a DocumentResult, turning nullable proto
   * fields into absent ones. A missing document yields an empty result.
   */
  static toDomain(document: DocumentProto | null | undefined): DocumentResult {
    if (!document) {
      return { pageCount: 0 };
    }

    const result: DocumentResult = {
      text: optional(document.text),
      pageCount: document.pages?.length ?? 0,
    };

    if (document.chunkedDocument) {
      result.chunkedDocument = {
        chunks: (document.chunkedDocument.chunks ?? []).map(
          (chunk): DocumentChunk => ({
            chunkId: optional(chunk.chunkId),
            content: optional(chunk.content),
          }),
        ),
      };
    }

    if (document.documentLayout) {
      result.documentLayout = {
        blocks: (document.documentLayout.blocks ?? []).map(
          (block): LayoutBlock => ({
            blockId: optional(block.blockId),
            textBlock: block.textBlock
              ? {
                  text: optional(block.textBlock.text),
                  type: optional(block.textBlock.type),
                }
              : undefined,
          }),
        ),
      };
    }

    return result;
  }
}
