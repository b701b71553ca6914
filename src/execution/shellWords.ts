import { parse, quote } from "shell-quote";

/**
 * Splits a command line into argv the way a POSIX shell would tokenize it.
 * Variables are left as written; the farm blade expands them.
 */
export function splitShellWords(command: string): string[] {
  const entries = parse(command, (name: string) => `$${name}`);
  const argv: string[] = [];
  for (const entry of entries) {
    if (typeof entry === "string") {
      argv.push(entry);
    } else if ("pattern" in entry) {
      argv.push(entry.pattern);
    } else if ("op" in entry) {
      argv.push(entry.op);
    }
  }
  return argv;
}

export function joinShellWords(argv: string[]): string {
  return quote(argv);
}
