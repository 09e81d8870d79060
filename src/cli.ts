export interface CliOptions {
  configPath?: string;
  help: boolean;
  version: boolean;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

export const USAGE = `Usage: newsletter-archiver [options]

Options:
  --config <path>   Settings document to load and save (default: config.json beside the program)
  -h, --help        Show this help
  -v, --version     Print the version`;

export function parseOptions(args: string[] = process.argv.slice(2)): CliOptions {
  const options: CliOptions = { help: false, version: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const equalsIndex = arg.indexOf('=');

    if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '-v' || arg === '--version') {
      options.version = true;
    } else if (arg === '--config') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new CliError('--config expects a path');
      }
      options.configPath = value;
      i++;
    } else if (equalsIndex > 0 && arg.substring(0, equalsIndex) === '--config') {
      let value = arg.substring(equalsIndex + 1).trim();
      if ((value.startsWith("'") && value.endsWith("'")) || (value.startsWith('"') && value.endsWith('"'))) {
        value = value.slice(1, -1);
      }
      if (value.length === 0) {
        throw new CliError('--config expects a path');
      }
      options.configPath = value;
    } else {
      throw new CliError(`Unknown option: ${arg}`);
    }
  }

  return options;
}
