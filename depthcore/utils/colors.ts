//depthcore/utils/colors.ts

// Basic ANSI color helpers for Node console output.

export const Colors = {
  Reset: "\x1b[0m",

  Bright: "\x1b[1m",
  Dim: "\x1b[2m",

  FgRed: "\x1b[31m",
  FgGreen: "\x1b[32m",
  FgYellow: "\x1b[33m",
  FgCyan: "\x1b[36m",

  BrightGreen: "\x1b[92m",
  BrightCyan: "\x1b[96m",
};

export type ColorCode = (typeof Colors)[keyof typeof Colors] | string;

export function colorize(text: string, color?: ColorCode): string {
  if (!color) return text;
  return `${color}${text}${Colors.Reset}`;
}
