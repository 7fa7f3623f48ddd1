/**
 * Argument handling and exit codes for the find-path command
 */

import yargs from 'yargs';
import { loadConfig, type ConfigOverrides } from '../../server/src/lib/config.js';
import { isHeritageError, type HeritageError } from '../../server/src/lib/errors.js';
import { logger, setLogLevel } from '../../server/src/lib/logger.js';
import { datasetService } from '../../server/src/services/dataset.service.js';
import { pathService } from '../../server/src/services/path.service.js';
import { printPath } from './printPath.js';

export const EXIT = {
  ok: 0,
  failure: 1,
  unknownIdentifier: 2,
  noPath: 3,
} as const;

export const USAGE = 'Usage: find-path <csv> -a ANCESTOR_ID -c CHILD_ID [options]';

export interface CliIO {
  out: (line: string) => void;
  env?: NodeJS.ProcessEnv;
}

const exitCodeFor = (err: HeritageError): number => {
  switch (err.code) {
    case 'UnknownIdentifier':
      return EXIT.unknownIdentifier;
    case 'NoPathFound':
      return EXIT.noPath;
    default:
      return EXIT.failure;
  }
};

// yargs collects a repeated flag into an array
const single = (value: unknown, flag: string): string => {
  if (typeof value !== 'string') throw new Error(`--${flag} must be given once`);
  return value;
};

const singleOptional = (value: unknown, flag: string): string | undefined =>
  value === undefined ? undefined : single(value, flag);

const hasErrorCode = (err: unknown): err is Error & { code: string } =>
  err instanceof Error && 'code' in err && typeof err.code === 'string';

export const parseArgs = (args: string[]) =>
  yargs(args)
    .scriptName('find-path')
    .usage(USAGE)
    .example('find-path data/family.csv -a 20 -c 1', 'Show how person 20 is an ancestor of person 1')
    .option('ancestor', { alias: 'a', type: 'string', demandOption: true, describe: 'Ancestor person id (path start)' })
    .option('child', { alias: 'c', type: 'string', demandOption: true, describe: 'Descendant person id (path end)' })
    .option('delimiter', { alias: 'd', type: 'string', describe: 'Field separator (default ";")' })
    .option('config', { type: 'string', describe: 'JSON config file' })
    .option('color', { type: 'boolean', default: false, describe: 'Colour the output' })
    .option('quiet', { alias: 'q', type: 'boolean', default: false, describe: 'Only log errors' })
    .demandCommand(1, 1, 'Missing path to the relationship CSV')
    .strictOptions()
    .exitProcess(false)
    .fail(false)
    .help(false)
    .version(false)
    .parseSync();

export function runFindPath(args: string[], io: CliIO): number {
  let argv: ReturnType<typeof parseArgs>;
  let ancestorId: string;
  let descendantId: string;
  let delimiter: string | undefined;
  let configPath: string | undefined;
  try {
    argv = parseArgs(args);
    ancestorId = single(argv.ancestor, 'ancestor').trim();
    descendantId = single(argv.child, 'child').trim();
    delimiter = singleOptional(argv.delimiter, 'delimiter');
    configPath = singleOptional(argv.config, 'config');
  } catch (err) {
    logger.error('cli', err instanceof Error ? err.message : String(err));
    logger.error('cli', USAGE);
    return EXIT.failure;
  }

  const csvPath = String(argv._[0]);

  try {
    const overrides: ConfigOverrides = {};
    if (delimiter !== undefined) overrides.delimiter = delimiter;
    if (argv.quiet) overrides.logLevel = 'error';
    const config = loadConfig({ configPath, env: io.env, overrides });
    setLogLevel(config.logLevel);

    const graph = datasetService.load(csvPath, config);
    const path = pathService.findPath(graph, { ancestorId, descendantId });
    printPath({ path, unknownName: config.unknownName, color: argv.color, write: io.out });

    logger.done('find', `found path from ${ancestorId} to ${descendantId} in ${path.hops} hops`);
    return EXIT.ok;
  } catch (err) {
    if (isHeritageError(err)) {
      if (err.code === 'NoPathFound') {
        logger.error('find', 'No direct or indirect relationship found');
      } else {
        logger.error('find', err.message);
      }
      return exitCodeFor(err);
    }
    if (hasErrorCode(err)) {
      logger.error(
        'find',
        err.code === 'ENOENT' ? `Dataset not found: ${csvPath}` : `Cannot read dataset ${csvPath} (${err.code})`
      );
      return EXIT.failure;
    }
    throw err;
  }
}
