import path from 'node:path';

import { errorMessage } from './analyzer/errors.js';
import { loadIgnoredNamesCsv } from './analyzer/ignoreCsv.js';
import { createSearchTool, isSearchEngine } from './analyzer/search/index.js';
import { createApp } from './app.js';
import { GraphService } from './graphService.js';

async function main(): Promise<void> {
  const rootDir = path.resolve(process.env.CALLTREE_ROOT ?? process.cwd());
  const engineEnv = process.env.CALLTREE_ENGINE ?? 'ag';
  if (!isSearchEngine(engineEnv)) throw new Error(`Illegal CALLTREE_ENGINE=${engineEnv}`);
  const ignoreCsv = process.env.CALLTREE_IGNORE_CSV;

  const search = await createSearchTool(engineEnv, rootDir);
  const graphs = new GraphService({
    search,
    extraIgnoredNames: ignoreCsv ? await loadIgnoredNamesCsv(ignoreCsv) : [],
  });
  const app = createApp({ graphs });

  const port = Number(process.env.PORT ?? 3001);
  app.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`API server listening on http://localhost:${port} (corpus ${rootDir})`);
  });
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
