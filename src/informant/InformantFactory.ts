/**
 * InformantFactory — Constructs informants of catalogued types.
 *
 * Construction:
 * - resolves the type's source depth through the TypeRegistry, computing
 *   and caching 1 + the deepest parent's representative depth when the type
 *   is not yet registered (or when dynamic depth mode is off)
 * - fills the type's composed fields from their defaults, then applies the
 *   supplied fields and extra attributes
 * - validates the fields against the type's composed schema
 *
 * `typeName` and `sourceDepth` are derived, never taken from the caller,
 * unless `overwrite` is set.
 */

import {
  InformantValidationError,
  TypeNotConstructibleError,
} from '../core/errors.js';
import { moduleLogger, type Logger } from '../logging/logger.js';
import type { TypeCatalog } from '../ontology/TypeCatalog.js';
import type { TypeRegistry } from '../ontology/TypeRegistry.js';
import { InformantValidator } from './InformantValidator.js';
import type { Informant, InformantAttributes } from './types.js';

export interface InformantFactoryOptions {
  /** Reuse registered source depths (default: true) */
  dynamicDepthMode?: boolean;
  /** Validator shared with other factories (default: a new one) */
  validator?: InformantValidator;
  logger?: Logger;
}

export interface CreateInformantOptions {
  /** Apply protected attributes (typeName, sourceDepth) when supplied */
  overwrite?: boolean;
  /** Do not warn about ignored protected attributes */
  suppress?: boolean;
}

export interface ConvertInformantOptions {
  /** Transfer only the fields declared by the original type (default: true) */
  clip?: boolean;
  /** Transfer every field of the original; overrides clip (default: false) */
  push?: boolean;
  /** Do not record or log a warning for conversions outside the lineage */
  suppress?: boolean;
}

function uniqueStrings(values: string[]): string[] {
  return [...new Set(values)];
}

export class InformantFactory {
  private readonly dynamicDepthMode: boolean;
  private readonly validator: InformantValidator;
  private readonly log: Logger;

  constructor(
    public readonly catalog: TypeCatalog,
    public readonly registry: TypeRegistry,
    options: InformantFactoryOptions = {}
  ) {
    this.dynamicDepthMode = options.dynamicDepthMode ?? true;
    this.validator = options.validator ?? new InformantValidator();
    this.log = moduleLogger('InformantFactory', options.logger);
  }

  /**
   * Create an informant of `typeName`.
   *
   * @throws TypeNotConstructibleError if the type or one of its ancestors
   *   cannot be instantiated
   * @throws InformantValidationError if the fields do not satisfy the type's schema
   */
  create(
    typeName: string,
    attributes: InformantAttributes = {},
    options: CreateInformantOptions = {}
  ): Informant {
    return this.build(typeName, attributes, options, []);
  }

  /**
   * The default instance of a type, used to observe its source depth.
   *
   * @throws TypeNotConstructibleError if the default instance is invalid
   */
  createRepresentative(typeName: string): Informant {
    return this.representative(typeName, []);
  }

  /**
   * Source depth of a type, cached in the registry.
   */
  sourceDepthOf(typeName: string): number {
    return this.resolveSourceDepth(typeName, []);
  }

  /**
   * Re-type an informant.
   *
   * A conversion to a type that is not in the original's lineage records a
   * `warning` field on the result unless `suppress` is set.
   */
  convert(informant: Informant, newTypeName: string, options: ConvertInformantOptions = {}): Informant {
    const push = options.push ?? false;
    const clip = push ? false : (options.clip ?? true);

    let warning: string | undefined;
    if (options.suppress !== true && !this.catalog.lineage(informant.typeName).includes(newTypeName)) {
      warning =
        `Converted informant '${informant.name}' of type '${informant.typeName}' to type '${newTypeName}', ` +
        `which is not an ancestor of '${informant.typeName}'; some fields may be unpopulated.`;
      this.log.warn({ informant: informant.name, from: informant.typeName, to: newTypeName }, warning);
    }

    let fields: Record<string, unknown>;
    if (clip) {
      const declared = this.catalog.fieldsOf(informant.typeName);
      fields = Object.fromEntries(Object.entries(informant.fields).filter(([key]) => Object.hasOwn(declared, key)));
    } else {
      fields = { ...informant.fields };
    }
    if (warning !== undefined) {
      fields.warning = warning;
    }

    return this.create(newTypeName, {
      name: informant.name,
      description: informant.description,
      tags: informant.tags,
      referenceNames: informant.referenceNames,
      algorithm: informant.algorithm,
      algorithmicParameters: informant.algorithmicParameters,
      constructorCommand: informant.constructorCommand,
      fields,
    }, { suppress: true });
  }

  private representative(typeName: string, path: string[]): Informant {
    try {
      return this.build(typeName, {}, { suppress: true }, path);
    } catch (err) {
      if (err instanceof InformantValidationError) {
        throw new TypeNotConstructibleError(typeName, err.message);
      }
      throw err;
    }
  }

  private resolveSourceDepth(typeName: string, path: string[]): number {
    if (typeName === this.registry.rootType) {
      return 0;
    }

    const registered = this.registry.get(typeName);
    if (this.dynamicDepthMode && registered !== undefined) {
      return registered;
    }

    if (path.includes(typeName)) {
      throw new TypeNotConstructibleError(typeName, `inheritance cycle ${[...path, typeName].join(' -> ')}`);
    }

    const definition = this.catalog.get(typeName);
    if (definition === undefined) {
      throw new TypeNotConstructibleError(typeName, 'type is not declared');
    }
    if (definition.sourceDepth !== undefined) {
      this.registry.register(typeName, definition.sourceDepth);
      return definition.sourceDepth;
    }

    const parentDepths = definition.extends.map(
      parent => this.representative(parent, [...path, typeName]).sourceDepth
    );
    const depth = parentDepths.length === 0 ? 0 : 1 + Math.max(...parentDepths);
    this.registry.register(typeName, depth);
    return depth;
  }

  private build(
    typeName: string,
    attributes: InformantAttributes,
    options: CreateInformantOptions,
    path: string[]
  ): Informant {
    if (!this.catalog.has(typeName)) {
      throw new TypeNotConstructibleError(typeName, 'type is not declared');
    }

    const declaredFields = this.catalog.fieldsOf(typeName);
    const fields: Record<string, unknown> = {};
    for (const [name, field] of Object.entries(declaredFields)) {
      fields[name] = field.default !== undefined ? structuredClone(field.default) : null;
    }
    Object.assign(fields, attributes.fields ?? {});

    const informant: Informant = {
      name: attributes.name ?? '',
      description: attributes.description ?? '',
      tags: uniqueStrings(attributes.tags ?? []),
      referenceNames: [...(attributes.referenceNames ?? [])],
      typeName,
      sourceDepth: this.resolveSourceDepth(typeName, path),
      algorithm: attributes.algorithm ?? null,
      algorithmicParameters: attributes.algorithmicParameters ?? null,
      constructorCommand: attributes.constructorCommand ?? '',
      fields,
    };

    for (const key of ['typeName', 'sourceDepth'] as const) {
      const supplied = attributes[key];
      if (supplied === undefined) {
        continue;
      }
      if (options.overwrite === true) {
        if (key === 'typeName' && typeof supplied === 'string') {
          informant.typeName = supplied;
        } else if (key === 'sourceDepth' && typeof supplied === 'number') {
          informant.sourceDepth = supplied;
        }
      } else if (options.suppress !== true) {
        this.log.warn(
          { informant: informant.name, attribute: key },
          `Attribute '${key}' is derived and was not set; pass overwrite to set it explicitly`
        );
      }
    }

    this.validateFields(typeName, fields);
    return informant;
  }

  /**
   * Null stands for "not supplied": it is not checked against the field
   * schema, and a required field holding null is reported as missing.
   */
  private validateFields(typeName: string, fields: Record<string, unknown>): void {
    const schema = this.catalog.composedSchema(typeName);
    const supplied = Object.fromEntries(
      Object.entries(fields).filter(([, value]) => value !== null)
    );

    const result = this.validator.validate(typeName, supplied, schema);
    if (!result.valid) {
      throw new InformantValidationError(typeName, result.errors);
    }
  }
}

/**
 * Create a factory over a catalog and registry.
 */
export function createInformantFactory(
  catalog: TypeCatalog,
  registry: TypeRegistry,
  options?: InformantFactoryOptions
): InformantFactory {
  return new InformantFactory(catalog, registry, options);
}
