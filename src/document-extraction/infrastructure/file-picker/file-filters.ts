export interface FileFilter {
  name: string;
  extensions: string[]; // without dot; '*' matches any file
}

export const DIALOG_TITLE = 'Select a document to process';

export const DOCUMENT_FILE_FILTERS: FileFilter[] = [
  { name: 'PDF files', extensions: ['pdf'] },
  { name: 'Word documents', extensions: ['docx', 'doc'] },
  { name: 'PowerPoint files', extensions: ['pptx', 'ppt'] },
  { name: 'Excel files', extensions: ['xlsx', 'xls'] },
  {
    name: 'Image files',
    extensions: ['jpg', 'jpeg', 'png', 'tiff', 'tif', 'bmp', 'gif', 'webp'],
  },
  { name: 'Text files', extensions: ['txt'] },
  { name: 'All files', extensions: ['*'] },
];

export function filterPatterns(filter: FileFilter): string[] {
  return filter.extensions.map((extension) =>
    extension === '*' ? '*' : `*.${extension}`,
  );
}

export function isCatchAll(filter: FileFilter): boolean {
  return filter.extensions.includes('*');
}
