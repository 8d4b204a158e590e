/**
 * TypeGraphSerializer — Tabular persistence of a built type graph.
 *
 * The build command writes one row per type. The format follows the file
 * extension: YAML for .yaml/.yml, JSON otherwise.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import type { TypeGraph, TypeGraphRow, TypeNode } from './types.js';

const typeGraphRowSchema = z.object({
  typeName: z.string(),
  directParents: z.array(z.string()),
  directChildren: z.array(z.string()),
  isSink: z.boolean(),
  sourceDepth: z.number().int().nonnegative(),
  sinkDepth: z.number().int().nonnegative(),
  toNearestSink: z.array(z.string()),
});

const typeGraphFileSchema = z.object({
  rootType: z.string(),
  types: z.array(typeGraphRowSchema),
});

export type TypeGraphFile = z.infer<typeof typeGraphFileSchema>;

function isYamlPath(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

/**
 * Flatten a type graph into rows, preserving node order.
 */
export function typeGraphToTable(graph: TypeGraph): TypeGraphRow[] {
  return [...graph.nodes.values()].map(node => ({
    typeName: node.typeName,
    directParents: [...node.directParents],
    directChildren: [...node.directChildren],
    isSink: node.isSink,
    sourceDepth: node.sourceDepth,
    sinkDepth: node.sinkDepth,
    toNearestSink: [...node.nearestSinkChildren],
  }));
}

/**
 * Rebuild a type graph from rows.
 */
export function typeGraphFromTable(rootType: string, rows: TypeGraphRow[]): TypeGraph {
  const nodes = new Map<string, TypeNode>();
  for (const row of rows) {
    nodes.set(row.typeName, {
      typeName: row.typeName,
      directParents: new Set(row.directParents),
      directChildren: new Set(row.directChildren),
      isSink: row.isSink,
      sourceDepth: row.sourceDepth,
      sinkDepth: row.sinkDepth,
      nearestSinkChildren: new Set(row.toNearestSink),
    });
  }
  return { rootType, nodes };
}

/**
 * Serialize a type graph to text in the format implied by `path`.
 */
export function serializeTypeGraph(graph: TypeGraph, path: string): string {
  const file: TypeGraphFile = { rootType: graph.rootType, types: typeGraphToTable(graph) };
  return isYamlPath(path) ? stringifyYaml(file) : `${JSON.stringify(file, null, 2)}\n`;
}

export async function writeTypeGraph(graph: TypeGraph, path: string): Promise<void> {
  await writeFile(path, serializeTypeGraph(graph, path), 'utf-8');
}

/**
 * Read a type graph written by writeTypeGraph.
 */
export async function readTypeGraph(path: string): Promise<TypeGraph> {
  const content = await readFile(path, 'utf-8');
  const raw: unknown = isYamlPath(path) ? parseYaml(content) : JSON.parse(content);
  const file = typeGraphFileSchema.parse(raw);
  return typeGraphFromTable(file.rootType, file.types);
}
