import { Injectable } from '@nestjs/common';
import { spawn } from 'child_process';
import { DialogCommand } from './dialog-command.builder';
import { FilePickerError } from '../../../utils/errors/file-picker.error';

export interface DialogProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs a dialog program and waits for the user to close it.
 */
@Injectable()
export class DialogProcessRunner {
  run(dialog: DialogCommand): Promise<DialogProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(dialog.command, dialog.args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';

      // Decode across chunk boundaries so split multibyte paths stay intact
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');

      child.stdout.on('data', (data: string) => {
        stdout += data;
      });

      child.stderr.on('data', (data: string) => {
        stderr += data;
      });

      child.on('close', (code) => {
        resolve({ exitCode: code, stdout, stderr });
      });

      // Handle process errors (e.g., dialog program not installed)
      child.on('error', (error: NodeJS.ErrnoException) => {
        const message =
          error.code === 'ENOENT'
            ? `${dialog.command} not found. Install it or make sure it is in PATH.`
            : `Failed to start ${dialog.command}: ${error.message}`;

        reject(new FilePickerError({ message, command: dialog.command }));
      });
    });
  }
}
