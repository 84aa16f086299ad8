/**
 * Keil memory-class keywords and their SDCC spellings.
 */
export const MEMORY_CLASS_ALIASES: ReadonlyArray<readonly [keyword: string, target: string]> = [
  ['data', '__data'],
  ['idata', '__idata'],
  ['xdata', '__xdata'],
  ['pdata', '__pdata'],
  ['code', '__code'],
];

/** Preprocessor symbol SDCC predefines. */
export const TARGET_GUARD = '__SDCC__';

/**
 * Lines inserted after the anchor. The aliases only take effect under SDCC, so the converted header still
 * compiles unchanged with Keil.
 */
export function compatBlockLines(): string[] {
  const width = Math.max(...MEMORY_CLASS_ALIASES.map(([keyword]) => keyword.length));
  return [
    '',
    `#ifdef ${TARGET_GUARD}`,
    ...MEMORY_CLASS_ALIASES.map(
      ([keyword, target]) => `#define ${keyword.padEnd(width)} ${target}`,
    ),
    '#endif',
    '',
  ];
}
