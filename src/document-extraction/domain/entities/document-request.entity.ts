export const DEFAULT_CHUNK_SIZE = 1000;

export interface DocumentRequest {
  filePath: string;
  mimeType: string;
  chunkSize: number;
  includeAncestorHeadings: boolean;
}

export function createDocumentRequest(
  filePath: string,
  mimeType: string,
): DocumentRequest {
  return {
    filePath,
    mimeType,
    chunkSize: DEFAULT_CHUNK_SIZE,
    includeAncestorHeadings: true,
  };
}
