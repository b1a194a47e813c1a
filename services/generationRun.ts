import type { Logger } from 'winston';

import { generatorLog } from '../config/logger.js';
import type { CodeRequest } from '../validations/generate.js';
import { CodeGenerator, minPairwiseDistance } from './codeGenerator.js';
import { openCodeFile, readCodeFile } from './codeFiles.js';
import { createRandomSource, type RandomSource } from './randomSource.js';

export type GenerationOptions = {
  numDigits: number;
  minHammingDistance: number;
  requests: CodeRequest[];
  existing: string[];
  outDir: string;
  seed?: string;
  maxAttempts?: number;
};

/** Where one '.' per rejected candidate goes. */
export interface ProgressSink {
  write(chunk: string): unknown;
}

export type GenerationDeps = {
  random?: RandomSource;
  progress?: ProgressSink;
  log?: Logger;
};

export type PrefixResult = {
  prefix: string;
  requested: number;
  filePath: string;
  codes: string[];
};

export type GenerationSummary = {
  existingCount: number;
  results: PrefixResult[];
  usedCount: number;
  /**
   * Smallest distance between a code generated in this run and any other code
   * in use. Distances among the existing codes themselves are left out.
   */
  minDistance: number | null;
};

/**
 * Seeds a generator with the existing code files, then fills one
 * prefix_<prefix>.txt per request, in request order.
 */
export function runGeneration(options: GenerationOptions, deps: GenerationDeps = {}): GenerationSummary {
  const log = deps.log ?? generatorLog;
  const progress = deps.progress ?? process.stdout;

  // Dots share the line; a newline is emitted before the next log entry.
  let dotsPending = false;
  const endDots = () => {
    if (!dotsPending) return;
    progress.write('\n');
    dotsPending = false;
  };

  const generator = new CodeGenerator({
    numDigits: options.numDigits,
    random: deps.random ?? createRandomSource(options.seed),
    maxAttempts: options.maxAttempts,
    onReject: () => {
      progress.write('.');
      dotsPending = true;
    },
  });

  log.debug('Generator ready', {
    numDigits: options.numDigits,
    minHammingDistance: options.minHammingDistance,
    seeded: options.seed !== undefined,
    maxAttempts: options.maxAttempts ?? null,
  });

  for (const filePath of options.existing) {
    const { codes, blankLines } = readCodeFile(filePath);
    generator.addUsed(codes);
    const skipped = blankLines > 0 ? ` (skipped ${blankLines} blank lines)` : '';
    log.info(`Read file ${filePath} containing ${codes.length} entries${skipped}`);
  }
  const existingCount = generator.usedCount;

  const results: PrefixResult[] = [];
  for (const { prefix, count } of options.requests) {
    log.info(`Processing prefix ${prefix} trying to find ${count}.`);
    const file = openCodeFile(options.outDir, prefix);
    const codes: string[] = [];
    try {
      for (let i = 0; i < count; i++) {
        const code = generator.newCode(prefix, options.minHammingDistance);
        file.append(code);
        codes.push(code);
        endDots();
        log.info(`Found ${i + 1} of ${count}`);
      }
    } finally {
      endDots();
      file.close();
    }
    results.push({ prefix, requested: count, filePath: file.filePath, codes });
  }

  const minDistance = minPairwiseDistance(
    generator.used.slice(existingCount),
    generator.used.slice(0, existingCount)
  );
  log.info('All finished!', { usedCount: generator.usedCount, minDistance });

  return { existingCount, results, usedCount: generator.usedCount, minDistance };
}
