export interface CliArgs {
  command: 'serve' | 'scrape' | 'help';
  listenAddress?: string | undefined;
  telemetryPath?: string | undefined;
}

function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

/** Flags take `--flag=value` or `--flag value`. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { command: 'serve' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const [flag, inline] = splitFlag(arg);
    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[++i];
      if (next === undefined) throw new Error(`Missing value for ${flag}`);
      return next;
    };

    switch (flag) {
      case 'serve':
      case 'scrape':
        args.command = flag;
        break;
      case '-h':
      case '--help':
      case 'help':
        args.command = 'help';
        break;
      case '--web.listen-address':
        args.listenAddress = value();
        break;
      case '--web.telemetry-path':
        args.telemetryPath = value();
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
