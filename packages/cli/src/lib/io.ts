/**
 * I/O helpers for CLI
 */

/**
 * Where a command writes its output
 */
export interface CliIO {
  stdout(content: string): void;
  stderr(content: string): void;
  env: NodeJS.ProcessEnv;
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

export const processIO: CliIO = {
  stdout: writeStdout,
  stderr: writeStderr,
  env: process.env,
};
