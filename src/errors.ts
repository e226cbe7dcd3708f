/**
 * Error types surfaced by revlift.
 *
 * UserError and BundleIntegrityError abort the whole operation and are shown
 * verbatim. Nothing in this package retries.
 */

/**
 * A problem with the caller's input or repository state: bad refs, a range
 * that is not linear, an unsupported change record, a malformed bundle.
 */
export class UserError extends Error {
  readonly name = "UserError";

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, UserError.prototype);
  }
}

/**
 * A backend command exited unsuccessfully.
 */
export class ExternalProcessError extends Error {
  readonly name = "ExternalProcessError";
  readonly command: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string[], exitCode: number | null, stderr: string) {
    const status = exitCode === null ? "failed" : `exited with status ${exitCode}`;
    const detail = stderr ? `: ${stderr}` : "";
    super(`Command \`${command.join(" ")}\` ${status}${detail}`);
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
    Object.setPrototypeOf(this, ExternalProcessError.prototype);
  }
}

/**
 * A bundle chunk violated a structural invariant. The bundle has to be
 * exported again.
 */
export class BundleIntegrityError extends Error {
  readonly name = "BundleIntegrityError";
  readonly node: string;

  constructor(node: string, reason: string) {
    super(`Corrupt bundle chunk for ${node}: ${reason}`);
    this.node = node;
    Object.setPrototypeOf(this, BundleIntegrityError.prototype);
  }
}
