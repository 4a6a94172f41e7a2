/**
 * ICommandRunner: the single seam through which every subprocess is launched.
 * Calls block until the child exits; there is no timeout.
 */

export interface CommandOptions {
  /** Extra variables for the child only. Never logged. */
  env?: Record<string, string>;
  /** Send the child's stdout to this file instead of capturing it. */
  stdoutFile?: string;
  /** Let the child draw on our stderr (progress bars); it is not captured. */
  inheritStderr?: boolean;
  /** Return the result of a non-zero exit instead of throwing. */
  allowNonZeroExit?: boolean;
}

export interface CommandResult {
  status: number;
  stdout: string;
  stderr: string;
}

export interface ICommandRunner {
  run(bin: string, args: string[], opts?: CommandOptions): CommandResult;
}
