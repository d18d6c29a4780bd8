export function getArg(name: string, fallback?: string, argv: readonly string[] = process.argv) {
  const idx = argv.indexOf(`--${name}`);
  if (idx === -1) return fallback;
  const value = argv[idx + 1];
  if (value === undefined || value.startsWith("--")) return fallback;
  return value;
}

export function hasFlag(name: string, argv: readonly string[] = process.argv) {
  return argv.includes(`--${name}`);
}
