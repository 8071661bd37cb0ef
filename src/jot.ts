export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  constructor(readonly options: { nonEmpty?: boolean } = {}) {}

  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }
    if (this.options.nonEmpty && value.trim().length === 0) {
      throw new TypeError(`${path} must not be empty`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  constructor(readonly options: { integer?: boolean; min?: number } = {}) {}

  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a finite number`);
    }
    if (this.options.integer && !Number.isInteger(value)) {
      throw new TypeError(`${path} must be an integer`);
    }
    if (this.options.min !== undefined && value < this.options.min) {
      throw new TypeError(`${path} must be at least ${this.options.min}`);
    }

    return value;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>, readonly options: { minItems?: number } = {}) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }
    if (this.options.minItems !== undefined && value.length < this.options.minItems) {
      throw new TypeError(`${path} must contain at least ${this.options.minItems} item(s)`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class NullableNode<T> implements JotSchema<T | null> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | null {
    if (value === null) {
      return null;
    }
    return this.inner.parse(value, path);
  }
}

class DefaultNode<T> implements JotSchema<T> {
  constructor(readonly inner: JotSchema<T>, readonly fallback: T) {}

  parse(value: unknown, path: string = 'value'): T {
    if (value === undefined || value === null) {
      return this.fallback;
    }
    return this.inner.parse(value, path);
  }
}

type Shape = Record<string, JotSchema<unknown>>;

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

type InferShape<S extends Shape> = { [K in keyof S]: InferJot<S[K]> };

/** Unknown keys are ignored; only the keys of `shape` are read. */
class ObjectNode<S extends Shape> implements JotSchema<InferShape<S>> {
  constructor(readonly shape: S) {}

  parse(value: unknown, path: string = 'value'): InferShape<S> {
    if (!isRecord(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(value[key], `${path}.${key}`);
    }

    return result as InferShape<S>;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const jot = {
  string: (options?: { nonEmpty?: boolean }): JotSchema<string> => new StringNode(options),
  number: (options?: { min?: number }): JotSchema<number> => new NumberNode(options),
  integer: (options?: { min?: number }): JotSchema<number> => new NumberNode({ ...options, integer: true }),
  array: <T>(schema: JotSchema<T>, options?: { minItems?: number }): JotSchema<T[]> => new ArrayNode(schema, options),
  nullable: <T>(schema: JotSchema<T>): JotSchema<T | null> => new NullableNode(schema),
  withDefault: <T>(schema: JotSchema<T>, fallback: T): JotSchema<T> => new DefaultNode(schema, fallback),
  object: <S extends Shape>(shape: S): JotSchema<InferShape<S>> => new ObjectNode(shape),
};
