import { ValidationError } from '../utils/errors.js';

export interface CliArgs {
  output?: string;
  noSave?: boolean;
  help?: boolean;
}

export const parseArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--output': {
        const value = argv[++i];
        if (value === undefined || value.startsWith('--') || !value.trim()) {
          throw new ValidationError('--output requires a path');
        }
        args.output = value;
        break;
      }
      case '--no-save':
        args.noSave = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }

  return args;
};
