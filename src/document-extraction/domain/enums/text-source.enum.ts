/**
 * Which representation of the document the extracted text came from
 */
export enum TextSource {
  TEXT = 'TEXT',
  CHUNKS = 'CHUNKS',
  LAYOUT = 'LAYOUT',
  NONE = 'NONE',
}
