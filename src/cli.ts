#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { convertFile, convertInPlace } from './convert.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { LineEnding } from './frontend/source.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { nodeFileSystem } from './io/nodeFs.js';
import type { ConversionSummary, ConvertOptions, HeaderFileSystem } from './pipeline.js';

const PROGRAM = 'c51hdr';

/** Header converted by `--in-place` when no name is given. */
export const DEFAULT_IN_PLACE_HEADER = 'CH559.H';

type CliExit = { code: number };

type CommonCliOptions = {
  convert: ConvertOptions;
  reportPath?: string;
  quiet: boolean;
};

type CliOptions =
  | (CommonCliOptions & { mode: 'explicit'; input: string; output: string })
  | (CommonCliOptions & { mode: 'in-place'; primary: string });

/**
 * Where the CLI reads and writes. Tests substitute their own writers and working directory.
 */
export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  cwd: string;
  fs: HeaderFileSystem;
}

const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  cwd: process.cwd(),
  fs: nodeFileSystem,
};

export function usage(): string {
  return [
    `${PROGRAM} [options] <input.h> <output.h>`,
    `${PROGRAM} [options] --in-place [header]`,
    '',
    'Options:',
    `      --in-place        Regenerate [header] (default ${DEFAULT_IN_PLACE_HEADER}) from <header>.ORIGINAL`,
    '      --banner          Prepend the converted-header banner (always on with --in-place)',
    '      --bit-keyword     Rewrite the standalone word "bit" to "__bit"',
    '      --strip-typedef-qualifiers  Drop data/idata/xdata/pdata/code from typedef lines',
    '      --anchor <prefix> Insert the compatibility block after the first line with this prefix',
    '                        (default: #ifndef; empty disables the block)',
    '      --eol <lf|crlf>   Output line ending (default: same as input)',
    '      --report <file>   Write a JSON conversion report',
    '  -q, --quiet           Suppress info diagnostics and the summary line',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

async function readVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts when run from sources, dist/src/cli.js when built.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  for (const candidate of candidates) {
    let raw: string;
    try {
      raw = await readFile(candidate, 'utf8');
    } catch {
      continue;
    }
    const pkg = JSON.parse(raw) as unknown;
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg) {
      if (typeof pkg.version === 'string') return pkg.version;
    }
  }
  return '0.0.0';
}

function optionValue(
  argv: string[],
  i: number,
  flag: string,
  allowEmpty = false,
): { value: string; next: number } {
  const a = argv[i] ?? '';
  if (a.startsWith(`${flag}=`)) {
    const v = a.slice(flag.length + 1);
    if (!v && !allowEmpty) fail(`${flag} expects a value`);
    return { value: v, next: i };
  }
  const v = argv[i + 1];
  if (v === undefined || (!v && !allowEmpty)) fail(`${flag} expects a value`);
  return { value: v, next: i + 1 };
}

function matchesFlag(a: string, flag: string): boolean {
  return a === flag || a.startsWith(`${flag}=`);
}

async function parseArgs(argv: string[], io: CliIo): Promise<CliOptions | CliExit> {
  let inPlace = false;
  let quiet = false;
  let reportPath: string | undefined;
  const convert: ConvertOptions = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      io.stdout(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      io.stdout(`${await readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '--in-place') {
      inPlace = true;
      continue;
    }
    if (a === '--banner') {
      convert.banner = true;
      continue;
    }
    if (a === '--bit-keyword') {
      convert.bitKeyword = true;
      continue;
    }
    if (a === '--strip-typedef-qualifiers') {
      convert.stripTypedefQualifiers = true;
      continue;
    }
    if (a === '-q' || a === '--quiet') {
      quiet = true;
      continue;
    }
    if (matchesFlag(a, '--anchor')) {
      // An empty prefix disables the compatibility block.
      const { value, next } = optionValue(argv, i, '--anchor', true);
      convert.anchorPrefix = value;
      i = next;
      continue;
    }
    if (matchesFlag(a, '--eol')) {
      const { value, next } = optionValue(argv, i, '--eol');
      if (value !== 'lf' && value !== 'crlf') {
        fail(`Unsupported --eol "${value}" (expected lf|crlf)`);
      }
      const eol: LineEnding = value === 'crlf' ? '\r\n' : '\n';
      convert.lineEnding = eol;
      i = next;
      continue;
    }
    if (matchesFlag(a, '--report')) {
      const { value, next } = optionValue(argv, i, '--report');
      reportPath = resolve(io.cwd, value);
      convert.emitReport = true;
      i = next;
      continue;
    }
    if (a.startsWith('-') && a !== '-') {
      fail(`Unknown option "${a}"`);
    }
    positionals.push(a);
  }

  const extra = reportPath !== undefined ? { reportPath } : {};
  if (inPlace) {
    if (positionals.length > 1) fail(`--in-place takes at most one [header] argument`);
    const primary = resolve(io.cwd, positionals[0] ?? DEFAULT_IN_PLACE_HEADER);
    return { mode: 'in-place', primary, convert, quiet, ...extra };
  }

  const [input, output] = positionals;
  if (positionals.length !== 2 || input === undefined || output === undefined) {
    fail(`Expected <input.h> and <output.h> (or --in-place)`);
  }
  const inputPath = resolve(io.cwd, input);
  const outputPath = resolve(io.cwd, output);
  if (inputPath === outputPath) {
    fail(`<output.h> must differ from <input.h>; use --in-place instead`);
  }
  return { mode: 'explicit', input: inputPath, output: outputPath, convert, quiet, ...extra };
}

async function writeArtifacts(
  artifacts: Artifact[],
  io: CliIo,
  reportPath: string | undefined,
  diagnostics: Diagnostic[],
): Promise<string | undefined> {
  let headerPath: string | undefined;
  for (const a of artifacts) {
    const target = a.kind === 'header' ? a.path : reportPath;
    if (target === undefined) continue;
    const bytes =
      a.kind === 'header'
        ? a.bytes
        : new TextEncoder().encode(JSON.stringify(a.json, null, 2) + '\n');
    try {
      // Sequential: the header is on disk before the report that describes it.
      // eslint-disable-next-line no-await-in-loop
      await io.fs.writeBytes(target, bytes);
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.IoWriteFailed,
        severity: 'error',
        message: `Failed to write ${target}: ${String(err)}`,
        file: target,
      });
      return undefined;
    }
    if (a.kind === 'header') headerPath = target;
  }
  return headerPath;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.localeCompare(b.file);
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  return a.id.localeCompare(b.id);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export function formatSummary(summary: ConversionSummary): string {
  const { counts } = summary;
  const parts = [
    `${counts.PlainRegister} sfr`,
    `${counts.WideRegister} sfr16`,
    `${counts.BitAlias - summary.unresolved.length} sbit`,
    `${counts.ExternalAbsolute} extern`,
  ];
  const unresolved =
    summary.unresolved.length > 0
      ? `; ${summary.unresolved.length} sbit left unresolved (${summary.unresolved.map((u) => `${u.name}@${u.line}`).join(', ')})`
      : '';
  return `${PROGRAM}: rewrote ${parts.join(', ')}${unresolved}`;
}

export async function runCli(argv: string[], io: CliIo = processIo): Promise<number> {
  try {
    const parsed = await parseArgs(argv, io);
    if ('code' in parsed) return parsed.code;

    const deps = { fs: io.fs, formats: defaultFormatWriters };
    const res =
      parsed.mode === 'explicit'
        ? await convertFile(parsed.input, parsed.output, parsed.convert, deps)
        : await convertInPlace(parsed.primary, parsed.convert, deps);

    const diagnostics = [...res.diagnostics];
    let written: string | undefined;
    if (!hasErrors(diagnostics)) {
      written = await writeArtifacts(res.artifacts, io, parsed.reportPath, diagnostics);
    }

    const shown = diagnostics
      .filter((d) => !(parsed.quiet && d.severity === 'info'))
      .sort(compareDiagnosticsForCli);
    for (const d of shown) io.stderr(`${formatDiagnostic(d)}\n`);

    if (hasErrors(diagnostics) || written === undefined) return 1;

    if (res.summary && !parsed.quiet) io.stderr(`${formatSummary(res.summary)}\n`);
    io.stdout(`${written}\n`);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    io.stderr(`${PROGRAM}: ${msg}\n`);
    if (err instanceof Error && err.name === 'CliError') io.stderr(`${usage()}\n`);
    return 1;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  // npm bin links resolve to the built entry through realpath.
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
