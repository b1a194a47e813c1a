import { parseArgs } from 'node:util';

import { ConfigError, formatZodIssues } from '../utils/errors.js';
import { generateArgsSchema, type GenerateArgs } from '../validations/generate.js';

export const USAGE = `Usage: exam-codes [options] <min_hamming_distance> <digits> <request>...

Produces random numeric codes such that any two codes (including existing ones)
differ in at least <min_hamming_distance> character positions.

Arguments:
  min_hamming_distance  Minimum number of differing characters between any two codes
  digits                Number of digits in each code (1-15)
  request               N for N codes without a prefix (written to prefix_.txt), or
                        PREFIX:N for N codes starting with PREFIX (written to prefix_PREFIX.txt)

Options:
  --seed <u64>          Random seed, for a reproducible list
  --existing <file>     File of existing codes to keep away from, one per line (repeatable).
                        Blank lines are skipped
  --out-dir <dir>       Directory for the prefix_*.txt files (default: CODES_OUTPUT_DIR or .)
  --max-attempts <n>    Fail instead of searching forever after n rejected candidates for one code
  -h, --help            Show this help`;

export type CliCommand = { kind: 'help' } | { kind: 'generate'; args: GenerateArgs };

function readArgv(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        seed: { type: 'string' },
        existing: { type: 'string', multiple: true },
        'out-dir': { type: 'string' },
        'max-attempts': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    // node:util reports unknown options and missing option values as TypeErrors.
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = readArgv(argv);
  if (values.help) return { kind: 'help' };

  if (positionals.length < 2) {
    throw new ConfigError('expected <min_hamming_distance> <digits> <request>...');
  }
  const [minHammingDistance, digits, ...requests] = positionals;

  const result = generateArgsSchema.safeParse({
    seed: values.seed,
    minHammingDistance,
    digits,
    requests,
    existing: values.existing,
    outDir: values['out-dir'],
    maxAttempts: values['max-attempts'],
  });
  if (!result.success) {
    throw new ConfigError(formatZodIssues(result.error), result.error.issues);
  }
  return { kind: 'generate', args: result.data };
}
