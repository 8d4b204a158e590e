/**
 * Build Command
 *
 * Build the type graph of an ontology and write it as a table.
 */

import { Command } from 'commander';
import { buildTypeGraph } from '../../ontology/TypeGraphBuilder.js';
import { writeTypeGraph } from '../../ontology/TypeGraphSerializer.js';
import { openOntology, runCommand } from '../context.js';

interface BuildCommandOptions {
  ontology?: string;
  output: string;
  config?: string;
}

export const buildCommand = new Command('build')
  .description('Build the type graph of an ontology')
  .option('-O, --ontology <path>', 'Entry ontology document (default: ontology.path from the config)')
  .requiredOption('-o, --output <path>', 'Type graph table to write (.yaml/.yml for YAML, otherwise JSON)')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: BuildCommandOptions) => {
    await runCommand(options.config, async ctx => {
      const { catalog, registry, factory } = await openOntology(ctx, options.ontology);

      const graph = buildTypeGraph(catalog.toManifest(), registry, {
        dynamicDepthMode: ctx.config.ontology.dynamicDepthMode,
        instantiate: typeName => factory.createRepresentative(typeName),
        logger: ctx.logger,
      });
      await writeTypeGraph(graph, options.output);

      const sinks = [...graph.nodes.values()].filter(node => node.isSink).length;
      console.log(`Wrote ${graph.nodes.size} types (${sinks} sinks) to ${options.output}`);
    });
  });
