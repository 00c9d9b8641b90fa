const ansi = (code: number) => (s: string) =>
  process.env.NO_COLOR ? s : `\x1b[${code}m${s}\x1b[0m`;

export const theme = {
  heading: ansi(1),
  error: ansi(31),
  success: ansi(32),
  warn: ansi(33),
  muted: ansi(90),
} as const;
