/** Value following `flag` (or any of its aliases) in argv, or null when absent. */
export const getArgValue = (argv: readonly string[], ...flags: string[]): string | null => {
  for (const flag of flags) {
    const idx = argv.indexOf(flag);
    if (idx === -1) continue;
    const value = argv[idx + 1];
    if (value !== undefined && !value.startsWith('-')) return value;
  }
  return null;
};
