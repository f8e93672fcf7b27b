export type RuntimeEnv = {
  log: (message: string) => void;
  error: (message: string) => void;
  exit: (code: number) => never;
};

export const defaultRuntime: RuntimeEnv = {
  log: (message) => {
    process.stdout.write(`${message}\n`);
  },
  error: (message) => {
    process.stderr.write(`${message}\n`);
  },
  exit: (code) => {
    process.exit(code);
  },
};
