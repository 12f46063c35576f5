const EXEC_WORDS = new Set(["exec", "run"]);
// Options whose value is the next argument
const VALUE_OPTIONS = new Set(["-c", "--config", "-r", "--remote"]);

export interface SplitArgs {
  /** Arguments for shipit itself, the command word included */
  cliArgs: string[];
  /** Remote command line after `exec`/`run`, never parsed as options */
  execCommand?: string;
}

/**
 * `-V` is accepted as --version
 */
export function normalizeArgs(argv: string[]): string[] {
  return argv.map((arg) => (arg === "-V" ? "--version" : arg));
}

/**
 * Cut argv at the first positional `exec`/`run`. Everything after it is
 * the remote command line, verbatim.
 */
export function splitExecArgs(argv: string[]): SplitArgs {
  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index] ?? "";

    if (VALUE_OPTIONS.has(arg)) {
      index++;
      continue;
    }
    if (arg.startsWith("-")) {
      continue;
    }
    if (!EXEC_WORDS.has(arg)) {
      break;
    }

    const tail = argv.slice(index + 1);
    return {
      cliArgs: argv.slice(0, index + 1),
      execCommand: (tail[0] === "--" ? tail.slice(1) : tail).join(" "),
    };
  }

  return { cliArgs: argv };
}
