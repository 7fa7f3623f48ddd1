#!/usr/bin/env node
/**
 * Find how one person descends from another in a relationship dataset
 *
 * Usage:
 *   npx tsx scripts/find-path.ts samples/family.csv -a 20 -c 1 [options]
 *
 * Options:
 *   -d, --delimiter=C  field separator (default: ;)
 *   --config=FILE      JSON config file (delimiter, columns, unknownName, logLevel)
 *   --color            colour the output
 *   -q, --quiet        only log errors
 */

import { hideBin } from 'yargs/helpers';
import { runFindPath } from './utils/findPathCli.js';

process.exitCode = runFindPath(hideBin(process.argv), {
  out: (line) => console.log(line),
});
