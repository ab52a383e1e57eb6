import type { CLIOptions } from '../index';

export class ArgumentParser {
  parseArgs(args: string[]): CLIOptions {
    const options: CLIOptions = {
      inputs: []
    };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      switch (arg) {
        case '--version':
        case '-V':
          options.version = true;
          break;
        case '--help':
        case '-h':
          options.help = true;
          break;
        case '--verbose':
        case '-v':
          options.verbose = true;
          break;
        case '--debug':
        case '-d':
          options.debug = true;
          break;
        case '--translator': {
          const command = args[++i];
          if (!command || command.startsWith('-')) {
            throw new Error('--translator requires a command');
          }
          options.translator = command;
          break;
        }
        default:
          if (arg.startsWith('--translator=')) {
            const command = arg.slice('--translator='.length);
            if (!command) {
              throw new Error('--translator requires a command');
            }
            options.translator = command;
          } else if (arg.startsWith('-') && arg !== '-') {
            throw new Error(`Unknown option: ${arg}`);
          } else {
            options.inputs.push(arg);
          }
      }
    }

    return options;
  }
}
