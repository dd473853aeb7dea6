const COLORS = {
  RED: "\x1b[0;31m",
  GREEN: "\x1b[0;32m",
  YELLOW: "\x1b[1;33m",
  NC: "\x1b[0m",
};

/** Output channel for CLI commands; tests swap in one that records lines. */
export interface CliIO {
  print: (msg: string) => void;
  success: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

export function createDefaultCliIO(opts?: { color?: boolean }): CliIO {
  const color = opts?.color ?? Boolean(process.stdout.isTTY);
  const paint = (code: string, mark: string) => (color ? `${code}${mark}${COLORS.NC}` : mark);

  return {
    print: (msg) => console.log(msg),
    success: (msg) => console.log(`${paint(COLORS.GREEN, "✓")} ${msg}`),
    warn: (msg) => console.error(`${paint(COLORS.YELLOW, "!")} ${msg}`),
    error: (msg) => console.error(`${paint(COLORS.RED, "x")} ${msg}`),
  };
}
