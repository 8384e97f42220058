import { DocumentResult } from '../domain/entities/document-result.entity';
import { TextSource } from '../domain/enums/text-source.enum';

export const NO_TEXT_MESSAGE = 'No text could be extracted from the document.';

export interface TextSelection {
  text: string;
  source: TextSource;
}

function hasContent(text: string | undefined): text is string {
  return text !== undefined && text.trim().length > 0;
}

function joinPresent(values: Array<string | undefined>): string {
  return values
    .filter((value): value is string => value !== undefined)
    .join('\n');
}

/**
 * Pick the best available text from a Document AI result.
 *
 * Priority: flat text, then chunk contents, then layout block texts.
 * Each tier is used only when the previous one produced nothing but
 * whitespace.
 */
export function selectText(result: DocumentResult): TextSelection {
  if (hasContent(result.text)) {
    return { text: result.text, source: TextSource.TEXT };
  }

  const chunks = result.chunkedDocument?.chunks ?? [];
  if (chunks.length > 0) {
    const chunkText = joinPresent(chunks.map((chunk) => chunk.content));
    if (hasContent(chunkText)) {
      return { text: chunkText, source: TextSource.CHUNKS };
    }
  }

  const blocks = result.documentLayout?.blocks ?? [];
  if (blocks.length > 0) {
    const layoutText = joinPresent(
      blocks.map((block) => block.textBlock?.text),
    );
    if (hasContent(layoutText)) {
      return { text: layoutText, source: TextSource.LAYOUT };
    }
  }

  return { text: NO_TEXT_MESSAGE, source: TextSource.NONE };
}

export function extractText(result: DocumentResult): string {
  return selectText(result).text;
}
