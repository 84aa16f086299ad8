import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { decodeLatin1 } from './frontend/source.js';
import { isConvertedHeader } from './formats/writeHeader.js';
import type { HeaderFileSystem } from './pipeline.js';

export const BACKUP_SUFFIX = '.ORIGINAL';

/**
 * `first-run`: the vendor header was just moved to the backup name.
 * `subsequent-run`: a backup already existed; the primary file's content is ignored.
 */
export type AcquisitionState = 'first-run' | 'subsequent-run';

export interface PristineSource {
  state: AcquisitionState;
  primary: string;
  backup: string;
}

export function backupPathFor(primary: string): string {
  return `${primary}${BACKUP_SUFFIX}`;
}

/**
 * Read a header for conversion. A missing or unreadable file becomes an `HDR001` error.
 */
export async function readHeaderText(
  fs: HeaderFileSystem,
  path: string,
  diagnostics: Diagnostic[],
): Promise<string | undefined> {
  if (!(await fs.exists(path))) {
    diagnostics.push({
      id: DiagnosticIds.MissingInputFile,
      severity: 'error',
      message: `Input file not found: ${path}`,
      file: path,
    });
    return undefined;
  }
  try {
    return decodeLatin1(await fs.readBytes(path));
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.MissingInputFile,
      severity: 'error',
      message: `Failed to read input file: ${String(err)}`,
      file: path,
    });
    return undefined;
  }
}

/**
 * Locate the pristine vendor header for an in-place run, creating the backup on first use.
 *
 * The backup is only ever created by renaming the primary; once it exists it is never written again. The
 * primary is refused as an original when it already carries the converted-header marker.
 */
export async function resolvePristineSource(
  primary: string,
  fs: HeaderFileSystem,
  diagnostics: Diagnostic[],
): Promise<PristineSource | undefined> {
  const backup = backupPathFor(primary);
  if (await fs.exists(backup)) {
    return { state: 'subsequent-run', primary, backup };
  }

  if (!(await fs.exists(primary))) {
    diagnostics.push({
      id: DiagnosticIds.MissingInputFile,
      severity: 'error',
      message: `Neither ${primary} nor its backup ${backup} exists.`,
      file: primary,
    });
    return undefined;
  }

  const text = await readHeaderText(fs, primary, diagnostics);
  if (text === undefined) return undefined;
  if (isConvertedHeader(text)) {
    diagnostics.push({
      id: DiagnosticIds.AlreadyConverted,
      severity: 'error',
      message: `${primary} is already a converted header but ${backup} is missing; restore the vendor header as ${backup} and rerun.`,
      file: primary,
    });
    return undefined;
  }

  await fs.rename(primary, backup);
  diagnostics.push({
    id: DiagnosticIds.BackupCreated,
    severity: 'info',
    message: `First run: moved ${primary} to ${backup}.`,
    file: primary,
  });
  return { state: 'first-run', primary, backup };
}
