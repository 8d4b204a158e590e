/**
 * Shared setup for CLI commands: configuration, logging, and the type system.
 */

import { loadConfig } from '../config/loader.js';
import type { AppConfig } from '../config/types.js';
import { errorMessage } from '../core/errors.js';
import { InformantFactory } from '../informant/InformantFactory.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { loadOntology } from '../ontology/OntologyLoader.js';
import type { TypeCatalog } from '../ontology/TypeCatalog.js';
import { TypeRegistry } from '../ontology/TypeRegistry.js';

export interface CliContext {
  config: AppConfig;
  logger: Logger;
}

export interface OntologyContext {
  catalog: TypeCatalog;
  registry: TypeRegistry;
  factory: InformantFactory;
}

export async function createContext(configPath: string | undefined): Promise<CliContext> {
  const bootstrap = createLogger({ name: 'informant-ontology' });
  const config = await loadConfig({
    ...(configPath !== undefined ? { configPath } : {}),
    logger: bootstrap,
  });
  return {
    config,
    logger: createLogger({ level: config.logging.level }),
  };
}

/**
 * Load the ontology named on the command line, or the configured one.
 */
export async function openOntology(ctx: CliContext, ontologyPath: string | undefined): Promise<OntologyContext> {
  const path = ontologyPath ?? ctx.config.ontology.path;
  if (path === null) {
    throw new Error('No ontology given; pass --ontology or set ontology.path in the config file');
  }
  const { rootType, dynamicDepthMode } = ctx.config.ontology;
  const { catalog } = await loadOntology(path, { rootType });
  const registry = new TypeRegistry(rootType);
  const factory = new InformantFactory(catalog, registry, { dynamicDepthMode, logger: ctx.logger });
  return { catalog, registry, factory };
}

/**
 * The collection file named on the command line, or the configured one.
 */
export function collectionPath(ctx: CliContext, path: string | undefined): string {
  const resolved = path ?? ctx.config.store.path;
  if (resolved === null) {
    throw new Error('No collection given; pass --collection or set store.path in the config file');
  }
  return resolved;
}

/**
 * Run a command body, reporting failures and setting a non-zero exit code.
 */
export async function runCommand(
  configPath: string | undefined,
  body: (ctx: CliContext) => Promise<void>
): Promise<void> {
  let ctx: CliContext;
  try {
    ctx = await createContext(configPath);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  try {
    await body(ctx);
  } catch (err) {
    ctx.logger.error({ err }, errorMessage(err));
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}
