export interface CliArgs {
  configPath?: string;
  log?: string;
  template?: string;
  outputDir?: string;
  help: boolean;
}

export const USAGE = 'Usage: thermal-map [--config <file>] [--log <file>] [--template <file>] [--out <dir>]';

const FLAGS: Record<string, Exclude<keyof CliArgs, 'help'>> = {
  '--config': 'configPath',
  '-c': 'configPath',
  '--log': 'log',
  '-l': 'log',
  '--template': 'template',
  '-t': 'template',
  '--out': 'outputDir',
  '-o': 'outputDir',
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${USAGE}`);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse `--flag value` and `--flag=value` arguments.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === undefined) continue;
    if (token === '--help' || token === '-h') {
      args.help = true;
      continue;
    }

    const eq = token.indexOf('=');
    const flag = eq >= 0 ? token.slice(0, eq) : token;
    const field = FLAGS[flag];
    if (field === undefined) {
      throw new CliUsageError(`Unknown argument: ${token}`);
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = token.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i += 1;
    }
    if (value === undefined || value.length === 0) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    args[field] = value;
  }

  return args;
}
