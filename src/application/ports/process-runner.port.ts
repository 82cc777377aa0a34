export interface ProcessRunOptions {
  /** Pipe stdout/stderr back to the caller instead of inheriting them. */
  captureOutput: boolean;
  cwd?: string;
  /** Kill the child with SIGTERM once this many milliseconds pass. */
  timeoutMs?: number;
}

export interface ProcessRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Empty unless output was captured. */
  stdout: string;
  stderr: string;
}

export interface IProcessRunner {
  /**
   * Runs a command to completion. Rejects when it cannot be started,
   * e.g. with an `ENOENT` error for a missing binary.
   */
  run(
    command: string,
    args: readonly string[],
    options: ProcessRunOptions
  ): Promise<ProcessRunResult>;
  /** Starts a detached command without waiting for it to exit. */
  launch(command: string, args: readonly string[]): Promise<void>;
}
