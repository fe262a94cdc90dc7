/**
 * Process-facing side of the CLI: output streams and exit.
 */

export type RuntimeEnv = {
  log: (message: string) => void;
  error: (message: string) => void;
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (message) => {
    process.stdout.write(`${message}\n`);
  },
  error: (message) => {
    process.stderr.write(`${message}\n`);
  },
  exit: (code) => {
    process.exitCode = code;
  },
};
