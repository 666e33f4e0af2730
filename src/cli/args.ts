/**
 * Command line for the server entry point
 *
 * Usage:
 *   pipegate [--config <file>] [--help]
 *   pipegate -c <file>
 */

export interface CliArgs {
  configPath?: string;
  help: boolean;
}

export const USAGE = `
Usage:
  pipegate [options]

Options:
  -c, --config <file>   Configuration document (default: $CONFIG_PATH or pipegate.yaml)
  -h, --help            Show this help
`;

/**
 * Parse process arguments (without the node and script entries)
 * @throws Error on an unknown option or a missing value
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      result.help = true;
    } else if (arg.startsWith('--config=')) {
      result.configPath = arg.slice('--config='.length);
    } else if (arg === '-c' || arg === '--config') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error(`Option ${arg} needs a file path`);
      }
      result.configPath = value;
      i++;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (result.configPath !== undefined && result.configPath.length === 0) {
    throw new Error('Option --config needs a file path');
  }

  return result;
}
