/**
 * A failure of the command line itself (bad usage), as opposed to a failure
 * to resolve the user's arguments.
 */
export class CommandError extends Error {
  constructor(
    message: string,
    readonly exitCode: number = 2
  ) {
    super(message);
    this.name = "CommandError";
  }
}
