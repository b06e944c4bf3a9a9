import { SchemaError } from "./errors";
import {
  CompiledSchema,
  compileSchema,
  type FieldDescriptor,
  type SchemaLike,
} from "./schema";

/**
 * SchemaRegistry caches compiled schemas.
 *
 * Descriptor lists are keyed by identity, so a list declared once (for
 * instance as a module constant) is compiled once. Schemas may also be
 * registered under a name and looked up later.
 */
export class SchemaRegistry {
  private byDescriptors: WeakMap<readonly FieldDescriptor[], CompiledSchema> = new WeakMap();
  private byName: Map<string, CompiledSchema> = new Map();

  /**
   * Returns the compiled form of a schema, compiling and caching raw
   * descriptor lists on first use.
   */
  resolve(schema: SchemaLike): CompiledSchema {
    if (schema instanceof CompiledSchema) {
      return schema;
    }
    let compiled = this.byDescriptors.get(schema);
    if (!compiled) {
      compiled = compileSchema(schema);
      this.byDescriptors.set(schema, compiled);
    }
    return compiled;
  }

  /**
   * Registers a schema under a name.
   */
  register(name: string, schema: SchemaLike): CompiledSchema {
    const compiled = this.resolve(schema);
    this.byName.set(name, compiled);
    return compiled;
  }

  /**
   * Gets a schema registered under a name.
   */
  get(name: string): CompiledSchema {
    const compiled = this.byName.get(name);
    if (!compiled) {
      throw new SchemaError(`Schema not registered: ${name}`);
    }
    return compiled;
  }

  /**
   * Checks if a name is registered.
   */
  isRegistered(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Clears all cached and registered schemas.
   */
  clear(): void {
    this.byDescriptors = new WeakMap();
    this.byName.clear();
  }
}

/**
 * Global default registry instance.
 */
export const defaultSchemaRegistry = new SchemaRegistry();

/**
 * Registers a schema with the default registry.
 */
export function registerSchema(name: string, schema: SchemaLike): CompiledSchema {
  return defaultSchemaRegistry.register(name, schema);
}
