/**
 * Reduce Command
 *
 * Remove redundant reference names from the informants of a collection.
 */

import { Command } from 'commander';
import { reduceReferences } from '../../informant/ReferenceReducer.js';
import { loadCollection, saveCollection } from '../../store/CollectionPersistence.js';
import { collectionPath, runCommand } from '../context.js';

interface ReduceCommandOptions {
  collection?: string;
  name?: string;
  output?: string;
  config?: string;
}

export const reduceCommand = new Command('reduce')
  .description('Reduce reference names to those not reachable through another reference')
  .option('-C, --collection <path>', 'Collection file (default: store.path from the config)')
  .option('-n, --name <name>', 'Reduce only this informant')
  .option('-o, --output <path>', 'Write the result here instead of over the collection')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: ReduceCommandOptions) => {
    await runCommand(options.config, async ctx => {
      const path = collectionPath(ctx, options.collection);
      const { collection } = await loadCollection(path, { collection: { logger: ctx.logger } });

      const names = options.name !== undefined ? [options.name] : [...new Set(collection.names())];
      let pruned = 0;
      for (const name of names) {
        const result = reduceReferences(collection.require(name), collection, { logger: ctx.logger });
        if (result.pruned.length > 0) {
          collection.update(result.informant);
          pruned += result.pruned.length;
          console.log(`${name}: removed ${result.pruned.join(', ')}`);
        }
      }

      await saveCollection(collection, options.output ?? path);
      console.log(`Reduced ${names.length} informants, removed ${pruned} redundant references`);
    });
  });
