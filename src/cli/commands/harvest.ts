/**
 * Harvest Command
 *
 * Append one informant per file below a folder to a collection.
 */

import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { harvestFolder } from '../../harvest/FolderHarvester.js';
import { loadCollection, saveCollection } from '../../store/CollectionPersistence.js';
import { InformantCollection } from '../../store/InformantCollection.js';
import { collectionPath, openOntology, runCommand } from '../context.js';

interface HarvestCommandOptions {
  folder: string;
  type: string;
  sequence?: string;
  useLocation?: boolean;
  replace?: boolean;
  collection?: string;
  ontology?: string;
  config?: string;
}

export const harvestCommand = new Command('harvest')
  .description('Create informants for the files below a folder')
  .requiredOption('-f, --folder <path>', 'Root folder')
  .requiredOption('-t, --type <name>', 'Type of the harvested informants')
  .option('-s, --sequence <names>', 'Comma-separated attribute names for the path segments')
  .option('-l, --use-location', 'Store each file path in the location field')
  .option('-r, --replace', 'Replace informants whose name is already stored')
  .option('-C, --collection <path>', 'Collection file (default: store.path from the config)')
  .option('-O, --ontology <path>', 'Entry ontology document (default: ontology.path from the config)')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: HarvestCommandOptions) => {
    await runCommand(options.config, async ctx => {
      const { factory } = await openOntology(ctx, options.ontology);
      const path = collectionPath(ctx, options.collection);
      const collection = existsSync(path)
        ? (await loadCollection(path, { collection: { logger: ctx.logger } })).collection
        : new InformantCollection({ logger: ctx.logger });

      const informants = await harvestFolder(options.folder, factory, {
        typeName: options.type,
        attributeSequence: options.sequence !== undefined
          ? options.sequence.split(',').map(s => s.trim()).filter(s => s.length > 0)
          : [],
        useLocation: options.useLocation ?? false,
        logger: ctx.logger,
      });

      const report = collection.append(informants, {
        replace: options.replace ?? false,
        verify: ctx.config.store.verifyOnAppend,
      });
      await saveCollection(collection, path);
      console.log(
        `Harvested ${informants.length} files: ${report.inserted.length} inserted, ` +
        `${report.replaced.length} replaced, ${report.skipped.length} skipped`
      );
    });
  });
