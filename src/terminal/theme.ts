const useColor = () => Boolean(process.stderr.isTTY) && !process.env.NO_COLOR;

function paint(code: string) {
  return (s: string) => (useColor() ? `\x1b[${code}m${s}\x1b[0m` : s);
}

export const theme = {
  error: paint("31"),
  success: paint("32"),
  warn: paint("33"),
  info: paint("34"),
  muted: paint("90"),
} as const;
