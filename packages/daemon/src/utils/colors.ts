/**
 * ANSI color codes for the daemon's startup and shutdown banners.
 */

export const colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
} as const;

export type ColorKey = Exclude<keyof typeof colors, "reset">;

/**
 * Wrap text in a color, resetting afterwards.
 */
export function paint(color: ColorKey, text: string | number): string {
  return `${colors[color]}${text}${colors.reset}`;
}
