import { Injectable, Logger } from '@nestjs/common';
import { FilePickerPort } from '../../domain/ports/file-picker.port';
import { FilePickerError } from '../../../utils/errors/file-picker.error';
import { buildDialogCommand } from './dialog-command.builder';
import { DialogProcessRunner } from './dialog-process.runner';
import { DIALOG_TITLE, DOCUMENT_FILE_FILTERS } from './file-filters';

// zenity and osascript exit with 1 when the dialog is dismissed
const CANCEL_EXIT_CODE = 1;

/**
 * Native File Picker Adapter
 *
 * Delegates to the host's own dialog: PowerShell's OpenFileDialog on
 * Windows, `choose file` through osascript on macOS, zenity elsewhere.
 */
@Injectable()
export class NativeFilePickerAdapter implements FilePickerPort {
  private readonly logger = new Logger(NativeFilePickerAdapter.name);
  private readonly platform: NodeJS.Platform = process.platform;

  constructor(private readonly runner: DialogProcessRunner) {}

  async pickFile(): Promise<string | null> {
    const dialog = buildDialogCommand(
      this.platform,
      DIALOG_TITLE,
      DOCUMENT_FILE_FILTERS,
    );

    this.logger.debug(`Opening file dialog with ${dialog.command}`);
    const result = await this.runner.run(dialog);

    if (result.exitCode === CANCEL_EXIT_CODE) {
      return null;
    }

    if (result.exitCode !== 0) {
      throw new FilePickerError({
        message: `${dialog.command} exited with code ${result.exitCode}: ${result.stderr.trim().substring(0, 200)}`,
        command: dialog.command,
        exitCode: result.exitCode,
      });
    }

    const selected = result.stdout.trim();
    return selected.length > 0 ? selected : null;
  }
}
