/**
 * Command-line run: config, positional path overrides, pipeline, exit status.
 *
 * Failures are logged as `[checklist] <message>` and mapped to status 1;
 * nothing is thrown to the caller.
 */

import { buildAppConfig } from './config.js';
import type { Env } from './config.js';
import { errorMessage } from './errors.js';
import { createLogger, setLogLevel } from './logger.js';
import { generateChecklistPdf } from './pipeline.js';

const log = createLogger('checklist');

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * @param argv - Arguments after the script name: `[input.xml] [output.pdf]`
 * @returns Process exit status
 */
export async function run(argv: readonly string[], env: Env = process.env): Promise<number> {
  try {
    const appConfig = buildAppConfig(env);
    setLogLevel(appConfig.logLevel);

    const [inputArg, outputArg] = argv;

    const result = await generateChecklistPdf({
      inputPath: inputArg ?? appConfig.inputPath,
      outputPath: outputArg ?? appConfig.outputPath,
      schema: appConfig.schema,
      fixedColumnCount: appConfig.fixedColumnCount,
    });

    log.info(`Checklist saved to '${result.outputPath}'`, {
      pages: result.pageCount,
      columns: result.columnCount,
      categories: result.categoryCount,
      items: result.itemCount,
    });
    return EXIT_SUCCESS;
  } catch (err) {
    log.error(errorMessage(err));
    return EXIT_FAILURE;
  }
}
