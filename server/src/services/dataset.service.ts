import fs from 'fs';
import type { ColumnMapping } from '@heritage-pathfind/shared';
import { buildGraph, type AncestryGraph } from '../lib/graph/index.js';
import { parseRecords, readLines } from '../lib/records/index.js';
import { logger } from '../lib/logger.js';

export interface DatasetOptions {
  delimiter: string;
  columns: ColumnMapping;
}

/**
 * Relationship datasets: bytes → lines → records → frozen graph
 */
export const datasetService = {
  fromBuffer(buffer: Uint8Array, options: DatasetOptions): AncestryGraph {
    const graph = buildGraph(parseRecords(readLines(buffer), options));
    logger.graph('dataset', `${graph.nodeCount} people, ${graph.edgeCount} relationships`);
    return graph;
  },

  fromText(text: string, options: DatasetOptions): AncestryGraph {
    return datasetService.fromBuffer(Buffer.from(text, 'utf-8'), options);
  },

  load(filePath: string, options: DatasetOptions): AncestryGraph {
    logger.time('dataset', 'load');
    logger.start('dataset', `Reading ${filePath}`);
    const graph = datasetService.fromBuffer(fs.readFileSync(filePath), options);
    logger.timeEnd('dataset', 'load');
    return graph;
  },
};
