import { parseArgs } from 'node:util';
import { bold } from './utils/logger';
import type { FindOptions } from './find-files';

export function parseFindArgs(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      dir: { type: 'string' },
      recursive: { type: 'boolean', short: 'r' },
      'allow-dupes': { type: 'boolean' },
      algorithm: { type: 'string' },
      pattern: { type: 'string', multiple: true },
      hidden: { type: 'boolean' },
      all: { type: 'boolean' },
      json: { type: 'boolean' },
      quiet: { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
  });

  return {
    ...values,
    targetDir: positionals[0] || values.dir,
  };
}

export type FindArgs = ReturnType<typeof parseFindArgs>;

export function toFindOptions(args: FindArgs): FindOptions {
  return {
    recursive: args.recursive,
    allowDupes: args['allow-dupes'],
    algorithm: args.algorithm,
    patterns: args.pattern,
    hidden: args.hidden,
    all: args.all,
    json: args.json,
    quiet: args.quiet,
    verbose: args.verbose,
  };
}

export function helpText(version: string): string {
  return `
${bold(`unique-files v${version} - Find files in a directory, flagging duplicates by content`)}

${bold('Usage: unique-files <dir> [options]')}

${bold('Options:')}
  --dir=<path>            Directory to search (can also be positional)
  --recursive, -r         Search subdirectories too
  --allow-dupes           Skip hashing and report every file as unique
  --algorithm=<name>      Hash algorithm used to compare files (default: sha256)
  --pattern=<glob>        Only include matching files; may be repeated
  --hidden                Include dotfiles and files in dot-directories
  --all                   Print every file, not only duplicates
  --json                  Print one JSON object per file and no summary
  --quiet                 Show minimal output
  --verbose               Show detailed output including unique files
  --help, -h              Show this help message
  --version, -v           Show version information

${bold('Examples:')}
  unique-files ~/Pictures --recursive
  unique-files ~/Pictures -r --pattern="*.jpg" --pattern="*.png"
  unique-files ./downloads --json --algorithm=sha512
`;
}
