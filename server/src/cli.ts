#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';

import { errorMessage } from './analyzer/errors.js';
import { loadIgnoredNamesCsv } from './analyzer/ignoreCsv.js';
import { loadCallGraph } from './analyzer/loadCallGraph.js';
import { createSearchTool } from './analyzer/search/index.js';
import { formatTree } from './analyzer/tree/formatTree.js';
import { buildCallTree } from './analyzer/tree/queryTree.js';
import { parseCliArgs } from './cliArgs.js';

async function main(): Promise<void> {
  const options = parseCliArgs(hideBin(process.argv));

  const search = await createSearchTool(options.engine, options.rootDir);
  const extraIgnoredNames = options.ignoreCsv ? await loadIgnoredNamesCsv(options.ignoreCsv) : [];
  const { graph } = await loadCallGraph({
    search,
    extraIgnoredNames,
    trivialThreshold: options.trivialThreshold,
    lengthThreshold: options.lengthThreshold,
    workers: options.workers,
  });

  const tree = buildCallTree(graph, {
    name: options.name,
    filter: options.filter,
    maxDepth: options.maxDepth,
    direction: options.direction,
  });
  const lines = formatTree(tree, { verbose: options.verbose, leafKinds: options.leafKinds });
  process.stdout.write(`${lines.join('\n')}\n`);
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
