/**
 * Filter Command
 *
 * Print the names of the informants in a collection that satisfy a predicate.
 */

import { Command } from 'commander';
import { ProcessChunkExecutor } from '../../query/ProcessChunkExecutor.js';
import { loadCollection, saveCollection } from '../../store/CollectionPersistence.js';
import type { InformantCollection } from '../../store/InformantCollection.js';
import { collectionPath, openOntology, runCommand } from '../context.js';

interface FilterCommandOptions {
  collection?: string;
  expression: string;
  onMissing?: boolean;
  parallel?: boolean;
  workers?: string;
  ontology?: string;
  output?: string;
  config?: string;
}

export const filterCommand = new Command('filter')
  .description('Filter a collection with a predicate expression')
  .option('-C, --collection <path>', 'Collection file (default: store.path from the config)')
  .requiredOption('-e, --expression <expr>', 'Predicate, e.g. "(@fileType == \'tsv\') & isinstance(@self, \'File\')"')
  .option('-m, --on-missing', 'Treat clauses over missing attributes as true')
  .option('-p, --parallel', 'Evaluate in worker processes')
  .option('-w, --workers <n>', 'Worker processes (default: query.workers from the config)')
  .option('-O, --ontology <path>', 'Ontology used by isinstance()')
  .option('-o, --output <path>', 'Also save the matching rows as a collection')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: FilterCommandOptions) => {
    await runCommand(options.config, async ctx => {
      const { query } = ctx.config;
      const lineage = options.ontology !== undefined || ctx.config.ontology.path !== null
        ? (await openOntology(ctx, options.ontology)).catalog.lineageTable()
        : {};

      const { collection } = await loadCollection(collectionPath(ctx, options.collection), {
        collection: { lineage, escapeMarker: query.escapeMarker, logger: ctx.logger },
      });

      const onMissing = options.onMissing ?? query.onMissing;
      let matched: InformantCollection;
      if (options.parallel === true) {
        const workers = options.workers !== undefined ? Number.parseInt(options.workers, 10) : query.workers;
        if (!Number.isInteger(workers) || workers < 1) {
          throw new Error(`--workers must be a positive integer, got '${options.workers ?? ''}'`);
        }
        matched = await collection.filterParallel(options.expression, {
          onMissing,
          workers,
          executor: new ProcessChunkExecutor({ workers, logger: ctx.logger }),
          ...(query.chunkSize !== null ? { chunkSize: query.chunkSize } : {}),
        });
      } else {
        matched = collection.filter(options.expression, { onMissing });
      }

      for (const name of matched.names()) {
        console.log(name);
      }
      if (options.output !== undefined) {
        await saveCollection(matched, options.output);
      }
    });
  });
