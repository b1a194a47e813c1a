import { parseCliArgs, USAGE } from './config/cliArgs.js';
import { loadEnv } from './config/env.js';
import { cliLog, configureLogger } from './config/logger.js';
import { runGeneration, type GenerationDeps, type GenerationSummary } from './services/generationRun.js';
import { toAppError } from './utils/errors.js';

export type AppResult = {
  exitCode: number;
  summary?: GenerationSummary;
};

/**
 * Runs one CLI invocation. Never throws: failures are logged and turned into
 * a non-zero exit code.
 */
export function runApp(
  argv: readonly string[],
  processEnv: NodeJS.ProcessEnv = process.env,
  deps: GenerationDeps = {}
): AppResult {
  try {
    const env = loadEnv(processEnv);
    configureLogger({ nodeEnv: env.NODE_ENV, level: env.LOG_LEVEL, logDir: env.LOG_DIR });

    const command = parseCliArgs(argv);
    if (command.kind === 'help') {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return { exitCode: 0 };
    }

    const { args } = command;
    const summary = runGeneration(
      {
        numDigits: args.digits,
        minHammingDistance: args.minHammingDistance,
        requests: args.requests,
        existing: args.existing,
        outDir: args.outDir ?? env.CODES_OUTPUT_DIR,
        seed: args.seed,
        maxAttempts: args.maxAttempts ?? env.CODES_MAX_ATTEMPTS,
      },
      deps
    );
    return { exitCode: 0, summary };
  } catch (err) {
    const appErr = toAppError(err);
    cliLog.error(appErr.message, {
      code: appErr.code,
      ...(appErr.isOperational ? {} : { stack: appErr.stack }),
    });
    if (appErr.code === 'INVALID_CONFIG') {
      cliLog.info('Run with --help for usage.');
    }
    return { exitCode: appErr.exitCode };
  }
}
