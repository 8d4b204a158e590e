/**
 * OntologyLoader — Reads *.ontology.yaml documents into a TypeCatalog.
 *
 * An ontology document declares capabilities and types, and may import other
 * documents by relative path. Imports are loaded first, depth-first, and
 * each file is read once however many documents import it.
 *
 * The same reader backs the static manifest scan, which returns only type
 * names, parents, and declared depths without building anything.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { OntologyLoadError, errorMessage } from '../core/errors.js';
import { TypeCatalog } from './TypeCatalog.js';
import type {
  CapabilityDefinition,
  FieldDefinition,
  TypeDefinition,
  TypeManifest,
} from './types.js';
import { DEFAULT_ROOT_TYPE } from './types.js';

/** Suffix of ontology documents. */
export const ONTOLOGY_PATTERN = '.ontology.yaml';

const fieldDefinitionSchema = z.object({
  schema: z.record(z.unknown()).optional(),
  default: z.unknown().optional(),
  required: z.boolean().optional(),
  description: z.string().optional(),
}).strict();

const capabilitySchema = z.object({
  description: z.string().optional(),
  fields: z.record(fieldDefinitionSchema).default({}),
}).strict();

const typeEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  extends: z.array(z.string().min(1)).optional(),
  capabilities: z.array(z.string().min(1)).default([]),
  fields: z.record(fieldDefinitionSchema).default({}),
  sourceDepth: z.number().int().nonnegative().optional(),
}).strict();

const ontologyDocumentSchema = z.object({
  ontologyVersion: z.literal(1),
  name: z.string().optional(),
  imports: z.array(z.string().min(1)).default([]),
  capabilities: z.record(capabilitySchema).default({}),
  types: z.array(typeEntrySchema).default([]),
}).strict();

export type OntologyDocument = z.infer<typeof ontologyDocumentSchema>;

type ParsedField = z.infer<typeof fieldDefinitionSchema>;

/**
 * A parsed document together with the absolute path it was read from.
 */
export interface LoadedOntologyDocument {
  path: string;
  document: OntologyDocument;
}

export interface OntologyLoadOptions {
  /** Name of the universal root type (default: 'Informant') */
  rootType?: string;
}

export interface OntologyLoadResult {
  catalog: TypeCatalog;
  /** Absolute paths of the documents read, in load order */
  documents: string[];
}

/**
 * Parse and validate the text of one ontology document.
 */
export function parseOntologyDocument(content: string, path: string): OntologyDocument {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new OntologyLoadError(path, `invalid YAML: ${errorMessage(err)}`);
  }

  const result = ontologyDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? issue.path.join('.') : '(document)';
    throw new OntologyLoadError(path, `${where}: ${issue?.message ?? 'invalid document'}`);
  }
  return result.data;
}

/**
 * Read a document and everything it imports, imports first.
 */
export async function readOntologyDocuments(entryPath: string): Promise<LoadedOntologyDocument[]> {
  const loaded: LoadedOntologyDocument[] = [];
  const seen = new Set<string>();

  const visit = async (path: string, importChain: string[]): Promise<void> => {
    if (importChain.includes(path)) {
      throw new OntologyLoadError(path, `import cycle: ${[...importChain, path].join(' -> ')}`);
    }
    if (seen.has(path)) {
      return;
    }
    seen.add(path);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      throw new OntologyLoadError(path, errorMessage(err));
    }

    const document = parseOntologyDocument(content, path);
    for (const importPath of document.imports) {
      await visit(resolve(dirname(path), importPath), [...importChain, path]);
    }
    loaded.push({ path, document });
  };

  await visit(resolve(entryPath), []);
  return loaded;
}

function toFieldDefinition(parsed: ParsedField): FieldDefinition {
  return {
    ...(parsed.schema !== undefined ? { schema: parsed.schema } : {}),
    ...(parsed.default !== undefined ? { default: parsed.default } : {}),
    ...(parsed.required !== undefined ? { required: parsed.required } : {}),
    ...(parsed.description !== undefined ? { description: parsed.description } : {}),
  };
}

function toFieldDefinitions(parsed: Record<string, ParsedField>): Record<string, FieldDefinition> {
  const fields: Record<string, FieldDefinition> = {};
  for (const [name, field] of Object.entries(parsed)) {
    fields[name] = toFieldDefinition(field);
  }
  return fields;
}

/**
 * Convert loaded documents into definitions, checking for duplicates.
 */
export function collectDefinitions(
  documents: LoadedOntologyDocument[],
  rootType: string = DEFAULT_ROOT_TYPE
): { types: TypeDefinition[]; capabilities: CapabilityDefinition[] } {
  const types: TypeDefinition[] = [];
  const capabilities: CapabilityDefinition[] = [];
  const declaredIn = new Map<string, string>();

  for (const { path, document } of documents) {
    for (const [name, capability] of Object.entries(document.capabilities)) {
      capabilities.push({
        name,
        ...(capability.description !== undefined ? { description: capability.description } : {}),
        fields: toFieldDefinitions(capability.fields),
      });
    }

    for (const entry of document.types) {
      if (entry.name === rootType) {
        throw new OntologyLoadError(path, `type '${rootType}' is the implicit root and cannot be declared`);
      }
      const previous = declaredIn.get(entry.name);
      if (previous !== undefined) {
        throw new OntologyLoadError(path, `type '${entry.name}' already declared in ${previous}`);
      }
      declaredIn.set(entry.name, path);

      types.push({
        name: entry.name,
        ...(entry.description !== undefined ? { description: entry.description } : {}),
        extends: entry.extends ?? [rootType],
        capabilities: entry.capabilities,
        fields: toFieldDefinitions(entry.fields),
        ...(entry.sourceDepth !== undefined ? { sourceDepth: entry.sourceDepth } : {}),
      });
    }
  }

  return { types, capabilities };
}

/**
 * Load an ontology document (and its imports) into a catalog.
 */
export async function loadOntology(
  entryPath: string,
  options: OntologyLoadOptions = {}
): Promise<OntologyLoadResult> {
  const rootType = options.rootType ?? DEFAULT_ROOT_TYPE;
  const documents = await readOntologyDocuments(entryPath);
  const { types, capabilities } = collectDefinitions(documents, rootType);

  let catalog: TypeCatalog;
  try {
    catalog = new TypeCatalog(types, { rootType, capabilities });
  } catch (err) {
    throw new OntologyLoadError(resolve(entryPath), errorMessage(err));
  }

  return { catalog, documents: documents.map(d => d.path) };
}

/**
 * Scan ontology documents for a type manifest without building a catalog
 * or instantiating anything.
 */
export async function scanTypeManifest(
  entryPath: string,
  options: OntologyLoadOptions = {}
): Promise<TypeManifest> {
  const rootType = options.rootType ?? DEFAULT_ROOT_TYPE;
  const documents = await readOntologyDocuments(entryPath);
  const { types } = collectDefinitions(documents, rootType);

  const manifest: TypeManifest = { [rootType]: { parents: [], sourceDepth: 0 } };
  for (const definition of types) {
    manifest[definition.name] = {
      parents: definition.extends,
      sourceDepth: definition.sourceDepth ?? null,
    };
  }
  return manifest;
}
