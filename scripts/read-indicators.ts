#!/usr/bin/env node
/**
 * Entry point of the read-indicators command.
 *
 * Exit codes: 0 on success (group failures are only logged), 1 on
 * configuration errors or when the registry cannot be read.
 */

import 'dotenv/config';

import {
  buildProgram,
  runReadIndicators,
  writeReport,
  type ReadIndicatorsOptions,
} from '../src/cli/read-indicators.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';

const main = async (): Promise<number> => {
  const program = buildProgram();
  program.parse(process.argv);
  const options = program.opts<ReadIndicatorsOptions>();

  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const result = await runReadIndicators(options, { config, logger, write: writeReport });
  if (result.isErr()) {
    logger.error({ errorType: result.error.type }, result.error.message);
    return 1;
  }
  return 0;
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
