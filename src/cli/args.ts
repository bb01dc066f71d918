/**
 * Command-line argument parsing
 */

import { ValidationError } from '../errors/index.js';

export type CliCommand =
  | { command: 'scan'; rootPath: string; apply: boolean }
  | { command: 'benchmark'; positiveDir: string; negativeDir: string }
  | { command: 'help' };

export const USAGE = [
  'Usage:',
  '  clipsift scan <dir> [--apply]',
  '  clipsift benchmark <positiveDir> <negativeDir>',
  '',
  'scan copies detected files into tier folders; --apply moves them instead.',
].join('\n');

export function parseArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' };
  }

  const flags = rest.filter(arg => arg.startsWith('--'));
  const positional = rest.filter(arg => !arg.startsWith('--'));

  switch (command) {
    case 'scan': {
      const unknown = flags.filter(flag => flag !== '--apply');
      if (unknown.length > 0) {
        throw new ValidationError(`Unknown option: ${unknown[0]}`);
      }
      if (positional.length !== 1) {
        throw new ValidationError('scan expects exactly one directory');
      }
      return { command: 'scan', rootPath: positional[0], apply: flags.includes('--apply') };
    }
    case 'benchmark': {
      if (flags.length > 0) {
        throw new ValidationError(`Unknown option: ${flags[0]}`);
      }
      if (positional.length !== 2) {
        throw new ValidationError('benchmark expects a positive and a negative directory');
      }
      return { command: 'benchmark', positiveDir: positional[0], negativeDir: positional[1] };
    }
    default:
      throw new ValidationError(`Unknown command: ${command}`);
  }
}
