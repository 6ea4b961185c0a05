import { resolve } from 'node:path';
import { loadConfig, resolveConfigPaths } from '../config/loader.js';
import { createLogger } from '../logging/logger.js';
import { createProgressLogger, runPipeline } from '../pipeline/runPipeline.js';
import { USAGE, parseCliArgs } from './args.js';

/**
 * Run the command line front end. Flags override configured paths.
 *
 * @returns process exit code
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const loaded = await loadConfig({
    ...(args.configPath ? { configPath: args.configPath } : {}),
  });
  const logger = createLogger(loaded.config.logging.level);
  const paths = resolveConfigPaths(loaded);

  const outputPath = await runPipeline({
    logPath: args.log ? resolve(args.log) : paths.log,
    templatePath: args.template ? resolve(args.template) : paths.template,
    outputDir: args.outputDir ? resolve(args.outputDir) : paths.outputDir,
    outputFileName: loaded.config.output.fileName,
    onProgress: createProgressLogger(logger),
  });

  logger.info(`Result written to ${outputPath}`);
  return 0;
}
