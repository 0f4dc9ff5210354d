#!/usr/bin/env node
import { createProgram, toGenerationOptions } from './program.js';
import { orchestrateGeneration } from '../core/index.js';
import { handleError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

async function run(): Promise<void> {
  const program = createProgram(async (options) => {
    const logger = getLogger({ verbose: options.verbose });

    logger.debug('Parsed CLI arguments:');
    logger.debug(`  Output root: ${options.out}`);
    logger.debug(`  Tree: ${options.tree ?? 'built-in sample'}`);
    logger.debug(`  Null pages: ${options.nullPages ? 'enabled' : 'disabled'}`);
    logger.debug(`  Inline CSS: ${options.inlineCss ? 'enabled' : 'disabled'}`);
    if (options.stylesheet) {
      logger.debug(`  Stylesheet: ${options.stylesheet}`);
    }

    try {
      await orchestrateGeneration(toGenerationOptions(options));
      process.exit(0);
    } catch (err) {
      handleError(err);
    }
  });

  await program.parseAsync(process.argv);
}

run().catch(handleError);
