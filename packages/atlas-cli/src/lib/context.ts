export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CommandContext {
  cwd: string;
  io: CliIO;
  /** Fixed clock for output file names */
  now?: () => Date;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};
