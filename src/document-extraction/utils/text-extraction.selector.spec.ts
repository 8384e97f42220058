import { DocumentResult } from '../domain/entities/document-result.entity';
import { TextSource } from '../domain/enums/text-source.enum';
import {
  NO_TEXT_MESSAGE,
  extractText,
  selectText,
} from './text-extraction.selector';

describe('text-extraction.selector', () => {
  const layoutOf = (...texts: string[]): DocumentResult['documentLayout'] => ({
    blocks: texts.map((text, index) => ({
      blockId: String(index + 1),
      textBlock: { text, type: 'paragraph' },
    })),
  });

  describe('extractText', () => {
    it('should return the flat text verbatim when present', () => {
      const result: DocumentResult = {
        text: '  Invoice #42\nTotal: 10 EUR\n',
        chunkedDocument: { chunks: [{ content: 'chunk' }] },
        documentLayout: layoutOf('block'),
        pageCount: 1,
      };

      expect(extractText(result)).toBe('  Invoice #42\nTotal: 10 EUR\n');
    });

    it('should join chunk contents when the flat text is blank', () => {
      const result: DocumentResult = {
        text: '   \n',
        chunkedDocument: {
          chunks: [
            { chunkId: 'c1', content: 'A' },
            { chunkId: 'c2', content: 'B' },
          ],
        },
        documentLayout: layoutOf('X'),
        pageCount: 1,
      };

      expect(extractText(result)).toBe('A\nB');
    });

    it('should skip chunks without content', () => {
      const result: DocumentResult = {
        chunkedDocument: {
          chunks: [{ content: 'A' }, { chunkId: 'c2' }, { content: 'C' }],
        },
        pageCount: 1,
      };

      expect(extractText(result)).toBe('A\nC');
    });

    it('should fall back to layout blocks when there are no chunks', () => {
      const result: DocumentResult = {
        text: '',
        documentLayout: layoutOf('X', 'Y'),
        pageCount: 2,
      };

      expect(extractText(result)).toBe('X\nY');
    });

    it('should fall back to layout blocks when all chunks are blank', () => {
      const result: DocumentResult = {
        chunkedDocument: { chunks: [{ content: ' ' }, { content: '' }] },
        documentLayout: layoutOf('X', 'Y'),
        pageCount: 1,
      };

      expect(selectText(result)).toEqual({
        text: 'X\nY',
        source: TextSource.LAYOUT,
      });
    });

    it('should ignore layout blocks without a text block', () => {
      const result: DocumentResult = {
        chunkedDocument: { chunks: [] },
        documentLayout: {
          blocks: [
            { blockId: '1' },
            { blockId: '2', textBlock: { text: 'Y' } },
            { blockId: '3', textBlock: {} },
          ],
        },
        pageCount: 1,
      };

      expect(extractText(result)).toBe('Y');
    });

    it('should return the sentinel when nothing is usable', () => {
      expect(extractText({ pageCount: 0 })).toBe(
        'No text could be extracted from the document.',
      );
      expect(
        extractText({
          text: ' ',
          chunkedDocument: { chunks: [] },
          documentLayout: { blocks: [{ textBlock: { text: '\t' } }] },
          pageCount: 1,
        }),
      ).toBe(NO_TEXT_MESSAGE);
    });
  });

  describe('selectText', () => {
    it('should report the flat text as source', () => {
      expect(selectText({ text: 'Hello', pageCount: 1 })).toEqual({
        text: 'Hello',
        source: TextSource.TEXT,
      });
    });

    it('should report chunks as source', () => {
      expect(
        selectText({
          chunkedDocument: { chunks: [{ content: 'A' }] },
          pageCount: 1,
        }).source,
      ).toBe(TextSource.CHUNKS);
    });

    it('should report no source for the sentinel', () => {
      expect(selectText({ pageCount: 1 })).toEqual({
        text: NO_TEXT_MESSAGE,
        source: TextSource.NONE,
      });
    });
  });
});
