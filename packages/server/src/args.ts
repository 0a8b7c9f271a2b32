// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export interface CliArgs {
  readonly projectRoot?: string;
  readonly wrapper?: string;
  readonly help: boolean;
  readonly version: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  let projectRoot: string | undefined;
  let wrapper: string | undefined;
  let help = false;
  let version = false;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--project-root":
        if (next) {
          projectRoot = next;
          i++;
        }
        break;
      case "--wrapper":
        if (next) {
          wrapper = next;
          i++;
        }
        break;
      case "--help":
        help = true;
        break;
      case "--version":
        version = true;
        break;
    }
  }

  return {
    help,
    version,
    ...(projectRoot ? { projectRoot } : {}),
    ...(wrapper ? { wrapper } : {}),
  };
}
