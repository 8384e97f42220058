/**
 * FilePickerError - the native open-file dialog could not be shown
 *
 * Cancelling the dialog is not an error; this is raised only when the host
 * dialog program is missing or exits abnormally.
 */
export class FilePickerError extends Error {
  /**
   * Dialog program that was launched (e.g. zenity, osascript)
   */
  readonly command: string;

  /**
   * Exit code of the dialog program, null when it never started
   */
  readonly exitCode: number | null;

  constructor(params: {
    message: string;
    command: string;
    exitCode?: number | null;
  }) {
    super(params.message);
    this.name = 'FilePickerError';
    this.command = params.command;
    this.exitCode = params.exitCode ?? null;

    Object.setPrototypeOf(this, FilePickerError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: 'FilePickerError',
      message: this.message,
      command: this.command,
      exitCode: this.exitCode,
    };
  }
}
