export interface FilePickerPort {
  /**
   * Show a modal open-file dialog
   * @returns absolute path of the chosen file, or null if cancelled
   */
  pickFile(): Promise<string | null>;
}
