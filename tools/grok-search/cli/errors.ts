/** Exit code for missing or invalid configuration and arguments */
export const EXIT_CONFIG = 2;

export class CliError extends Error {
  readonly code: string;
  readonly exitCode: number;

  constructor(code: string, message: string, exitCode: number = EXIT_CONFIG) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

export function throwWithCode(code: string, message: string, exitCode?: number): never {
  throw new CliError(code, message, exitCode);
}

export function errorDetails(error: unknown): { code: string; message: string; exitCode: number } {
  if (error instanceof CliError) {
    return { code: error.code, message: error.message, exitCode: error.exitCode };
  }
  return {
    code: "CLI_ERROR",
    message: error instanceof Error ? error.message : String(error),
    exitCode: 1,
  };
}
