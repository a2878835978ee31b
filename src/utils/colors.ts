/**
 * Terminal colors for the CLI and the debug logger.
 *
 * Honors NO_COLOR and FORCE_COLOR, and only colors a TTY (or CI) otherwise.
 * Styles nest: colors.bold(colors.red('text')).
 */

export function detectColors(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdout?.isTTY)): boolean {
  // https://no-color.org/
  if ('NO_COLOR' in env) return false;
  if ('FORCE_COLOR' in env) return true;
  if (env.TERM === 'dumb') return false;
  if (isTTY) return true;
  return Boolean(env.CI);
}

const hasColors = detectColors();

const code = (open: number, close: number) => {
  if (!hasColors) return (s: string | number) => String(s);

  const openCode = `\x1b[${open}m`;
  const closeCode = `\x1b[${close}m`;
  const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

  return (s: string | number): string => openCode + String(s).replace(closeRe, openCode) + closeCode;
};

export const bold = code(1, 22);
export const dim = code(2, 22);
export const red = code(31, 39);
export const green = code(32, 39);
export const yellow = code(33, 39);
export const cyan = code(36, 39);
export const gray = code(90, 39);

const colors = {
  bold,
  dim,
  red,
  green,
  yellow,
  cyan,
  gray,
};

export default colors;
