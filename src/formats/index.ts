import type { FormatWriters } from './types.js';
import { writeHeader } from './writeHeader.js';
import { writeReport } from './writeReport.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeHeader,
  writeReport,
};
