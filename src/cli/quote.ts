export type ShellFlavor = "sh" | "tcsh";

const SHELL_ALIASES: Record<string, ShellFlavor> = {
  sh: "sh",
  bash: "sh",
  tcsh: "tcsh",
  csh: "tcsh",
};

/**
 * Map a shell name given on the command line to its quoting rules.
 *
 * @returns The flavor, or undefined for an unsupported shell
 */
export function resolveShell(name: string): ShellFlavor | undefined {
  return Object.hasOwn(SHELL_ALIASES, name) ? SHELL_ALIASES[name] : undefined;
}

/**
 * Quote a value so the target shell reads it back as a single word.
 */
export function quoteForShell(value: string, shell: ShellFlavor = "sh"): string {
  let body = value.replace(/'/g, "'\\''");
  if (shell === "tcsh") {
    body = body.replace(/!/g, "\\!").replace(/\n/g, "\\\n");
  }
  return `'${body}'`;
}
