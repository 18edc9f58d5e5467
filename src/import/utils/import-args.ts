import { UsageError } from '../errors/import.errors';
import { isPropertyMatchKey, PropertyMatchKey, PROPERTY_MATCH_KEYS } from '../constants/import.constants';

export const IMPORT_USAGE = [
  'Usage:',
  '  import_locations <csv-path>',
  `  import_properties <csv-path> [--skip-location] [--match-on ${PROPERTY_MATCH_KEYS.join('|')}]`,
].join('\n');

export type ImportInvocation =
  | { command: 'import_locations'; filePath: string }
  | { command: 'import_properties'; filePath: string; skipLocation: boolean; matchOn?: PropertyMatchKey };

/** Parses the arguments after the program name. */
export function parseImportArgs(argv: readonly string[]): ImportInvocation {
  const [command, ...rest] = argv;
  if (command !== 'import_locations' && command !== 'import_properties') {
    throw new UsageError(command ? `Unknown command: ${command}` : 'No command given');
  }

  const positional: string[] = [];
  let skipLocation = false;
  let matchOn: PropertyMatchKey | undefined;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (command === 'import_properties' && arg === '--skip-location') {
      skipLocation = true;
    } else if (command === 'import_properties' && (arg === '--match-on' || arg.startsWith('--match-on='))) {
      const value = arg === '--match-on' ? rest[++i] : arg.slice('--match-on='.length);
      if (value === undefined || !isPropertyMatchKey(value)) {
        throw new UsageError(`--match-on expects one of: ${PROPERTY_MATCH_KEYS.join(', ')}`);
      }
      matchOn = value;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option for ${command}: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError(`${command} expects exactly one CSV path`);
  }
  const [filePath] = positional;

  return command === 'import_locations'
    ? { command, filePath }
    : { command, filePath, skipLocation, matchOn };
}
