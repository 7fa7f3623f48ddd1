/**
 * CLI utility for printing a rendered ancestry path, optionally coloured
 */

import { Chalk } from 'chalk';
import type { AncestryPath } from '@heritage-pathfind/shared';
import { renderPath, type PathStyle } from '../../server/src/lib/renderPath.js';

interface PrintPathOptions {
  path: AncestryPath;
  unknownName: string;
  color?: boolean;
  write?: (line: string) => void;
}

const colorStyle = (): PathStyle => {
  const chalk = new Chalk({ level: 1 });
  return {
    name: (text) => chalk.hex('#DEADED').bold(text),
    label: (text) => chalk.blue(text),
    kind: (text) => chalk.hex('#d6406e')(text),
  };
};

export const printPath = ({
  path,
  unknownName,
  color,
  write = (line) => console.log(line),
}: PrintPathOptions): void => {
  const lines = renderPath(path, {
    unknownName,
    style: color ? colorStyle() : undefined,
  });
  lines.forEach((line) => write(line));
};

export default printPath;
