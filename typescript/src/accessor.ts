/**
 * Reads and writes named fields of host objects.
 *
 * The struct codec never touches host objects directly; every field
 * access goes through an accessor, so any object representation can be
 * encoded given a matching implementation.
 */
export interface FieldAccessor<T extends object = object> {
  /** Returns the field value; undefined or null means absent */
  get(target: T, name: string): unknown;
  /** Stores a decoded field value */
  set(target: T, name: string, value: unknown): void;
  /** Whether the field was explicitly set; consulted under Option.ExcludeUnset */
  isSet?(target: T, name: string): boolean;
  /** Transforms a value before encoding; used by fields flagged CustomSerializer */
  serialize?(target: T, name: string, value: unknown): unknown;
}

/**
 * Accessor for plain records: fields are own properties.
 */
export const recordAccessor: FieldAccessor = {
  get(target, name) {
    return Object.hasOwn(target, name) ? Reflect.get(target, name) : undefined;
  },
  set(target, name, value) {
    Object.defineProperty(target, name, {
      value,
      writable: true,
      enumerable: true,
      configurable: true,
    });
  },
  isSet(target, name) {
    return Object.hasOwn(target, name);
  },
};
