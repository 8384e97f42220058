import { FileFilter, filterPatterns, isCatchAll } from './file-filters';

export interface DialogCommand {
  command: string;
  args: string[];
}

function powershellString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function windowsDialog(title: string, filters: FileFilter[]): DialogCommand {
  const filter = filters
    .map((entry) => {
      const patterns = filterPatterns(entry).join(';');
      return `${entry.name} (${patterns})|${patterns}`;
    })
    .join('|');

  const script = [
    'Add-Type -AssemblyName System.Windows.Forms',
    '$dialog = New-Object System.Windows.Forms.OpenFileDialog',
    `$dialog.Title = ${powershellString(title)}`,
    `$dialog.Filter = ${powershellString(filter)}`,
    '[Console]::OutputEncoding = [System.Text.Encoding]::UTF8',
    'if ($dialog.ShowDialog() -eq [System.Windows.Forms.DialogResult]::OK) { Write-Output $dialog.FileName }',
  ].join('; ');

  return {
    command: 'powershell.exe',
    args: ['-NoProfile', '-NonInteractive', '-STA', '-Command', script],
  };
}

function macDialog(title: string, filters: FileFilter[]): DialogCommand {
  let chooser = `choose file with prompt ${appleScriptString(title)}`;

  // choose file has no filter menu; restrict types only without a catch-all
  if (!filters.some(isCatchAll)) {
    const extensions = Array.from(
      new Set(filters.flatMap((entry) => entry.extensions)),
    );
    chooser += ` of type {${extensions.map(appleScriptString).join(', ')}}`;
  }

  return {
    command: 'osascript',
    args: ['-e', `POSIX path of (${chooser})`],
  };
}

function zenityDialog(title: string, filters: FileFilter[]): DialogCommand {
  return {
    command: 'zenity',
    args: [
      '--file-selection',
      `--title=${title}`,
      ...filters.map(
        (entry) =>
          `--file-filter=${entry.name} | ${filterPatterns(entry).join(' ')}`,
      ),
    ],
  };
}

/**
 * Command line that shows the host's native open-file dialog and prints the
 * chosen path on standard output.
 */
export function buildDialogCommand(
  platform: NodeJS.Platform,
  title: string,
  filters: FileFilter[],
): DialogCommand {
  switch (platform) {
    case 'win32':
      return windowsDialog(title, filters);
    case 'darwin':
      return macDialog(title, filters);
    default:
      return zenityDialog(title, filters);
  }
}
