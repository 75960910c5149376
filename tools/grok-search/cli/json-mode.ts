export const OUTPUT_FORMATS = ["json", "text"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function getCliArgv(argv: string[] = process.argv.slice(2)): string[] {
  return argv;
}

/**
 * JSON is the default output; only `--format text` turns it off.
 */
export function isJsonModeRequested(argv: string[]): boolean {
  const index = argv.indexOf("--format");
  const value = index >= 0
    ? argv[index + 1]
    : argv.find((arg) => arg.startsWith("--format="))?.slice("--format=".length);
  return value !== "text";
}

export function configureStdoutForJsonMode(enabled: boolean): void {
  if (!enabled) return;

  // In JSON mode stdout carries exactly one JSON object.
  // Any incidental console.log output is redirected to stderr.
  console.log = (...args: unknown[]): void => {
    console.error(...args);
  };
}

export function emitJson(
  payload: unknown,
  write: (text: string) => void = (text) => {
    process.stdout.write(text);
  },
): void {
  write(`${JSON.stringify(payload)}\n`);
}
