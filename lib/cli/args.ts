/**
 * `--key=value` flags into a plain object. A bare `--flag` reads as "true";
 * positional arguments are ignored. Later flags win.
 */
export function parseFlagArgs(argv: string[]): Record<string, string> {
  const args: Record<string, string> = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    const key = (eq === -1 ? body : body.slice(0, eq)).trim();
    if (!key) continue;
    args[key] = eq === -1 ? 'true' : body.slice(eq + 1).trim();
  }
  return args;
}
