import { DuplicateTagError, SchemaError } from "./errors";
import { INFER_TYPE, MAX_TAG, TypeCode, type DeclaredType, isTypeCode } from "./types";

/**
 * Per-field flag bits.
 */
export enum FieldFlag {
  None = 0,
  /** Pass the value through FieldAccessor.serialize before encoding */
  CustomSerializer = 1,
}

/**
 * Declares one field of a struct schema.
 */
export interface FieldDescriptor {
  /** Name used by the field accessor */
  readonly name: string;
  /** Wire tag, 0-255 */
  readonly tag: number;
  /** Declared wire type, or INFER_TYPE to choose it from the value */
  readonly type: DeclaredType;
  /** Value assigned when the tag is missing from the wire */
  readonly defaultValue?: unknown;
  readonly flags?: number;
  /** Schema of a nested StructBegin field */
  readonly schema?: SchemaLike;
}

/**
 * A descriptor list compiled into a tag-indexed lookup table.
 *
 * Build it once per schema and reuse it; SchemaRegistry caches compiled
 * schemas by descriptor-list identity.
 */
export class CompiledSchema {
  readonly fields: readonly FieldDescriptor[];
  private readonly tagLookup: Int16Array;

  constructor(fields: readonly FieldDescriptor[], tagLookup: Int16Array) {
    this.fields = fields;
    this.tagLookup = tagLookup;
  }

  /**
   * Returns the descriptor for a tag, or undefined if the tag is unknown.
   */
  fieldForTag(tag: number): FieldDescriptor | undefined {
    const index = this.tagLookup[tag];
    return index === undefined || index < 0 ? undefined : this.fields[index];
  }

  /**
   * Returns the declaration index for a tag, or -1.
   */
  indexOfTag(tag: number): number {
    return this.tagLookup[tag] ?? -1;
  }
}

/**
 * A schema as accepted by the codec: raw descriptors or a compiled schema.
 */
export type SchemaLike = readonly FieldDescriptor[] | CompiledSchema;

/**
 * Compiles a descriptor list.
 *
 * Compiling is pure; the same list always yields an equivalent table.
 *
 * @throws DuplicateTagError if two descriptors share a tag
 * @throws SchemaError if a tag or type code is out of range
 */
export function compileSchema(descriptors: readonly FieldDescriptor[]): CompiledSchema {
  const tagLookup = new Int16Array(MAX_TAG + 1).fill(-1);
  const fields: FieldDescriptor[] = [];

  descriptors.forEach((field, index) => {
    if (!Number.isInteger(field.tag) || field.tag < 0 || field.tag > MAX_TAG) {
      throw new SchemaError(`Field "${field.name}" has tag ${field.tag}, expected 0-${MAX_TAG}`);
    }
    if (!isDeclarableType(field.type)) {
      throw new SchemaError(`Field "${field.name}" has unsupported type code ${field.type}`);
    }
    if (tagLookup[field.tag] !== -1) {
      throw new DuplicateTagError(field.tag);
    }
    tagLookup[field.tag] = index;
    fields.push(Object.freeze({ ...field }));
  });

  return new CompiledSchema(Object.freeze(fields), tagLookup);
}

function isDeclarableType(code: number): code is DeclaredType {
  if (code === INFER_TYPE) {
    return true;
  }
  return isTypeCode(code) && code !== TypeCode.StructEnd && code !== TypeCode.ZeroTag;
}

/**
 * Returns a compiled schema, compiling raw descriptors when needed.
 */
export function resolveSchema(
  schema: SchemaLike,
  compile: (descriptors: readonly FieldDescriptor[]) => CompiledSchema = compileSchema
): CompiledSchema {
  return schema instanceof CompiledSchema ? schema : compile(schema);
}

/**
 * Property under which an object exposes its schema.
 *
 * Objects carrying it are encoded as nested structs by the generic
 * encoder, reading their fields through the field accessor.
 */
export const schemaSymbol: unique symbol = Symbol.for("jce-codec.schema");

export interface SchemaCarrier {
  readonly [schemaSymbol]: SchemaLike;
}

export function isSchemaCarrier(value: unknown): value is SchemaCarrier {
  if (typeof value !== "object" || value === null || !(schemaSymbol in value)) {
    return false;
  }
  const schema: unknown = Reflect.get(value, schemaSymbol);
  return schema instanceof CompiledSchema || Array.isArray(schema);
}
