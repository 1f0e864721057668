export function isPlainObject(value: unknown): value is { [property: string]: unknown } {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const prototype = Object.getPrototypeOf(value);

  return prototype === Object.prototype || prototype === null;
}

/**
 * Reads a dotted property path such as `address.street`.
 * Throws when a segment does not exist.
 */
export function readPropertyPath(target: unknown, path: string): unknown {
  const segments = path.split('.');

  return segments.reduce<unknown>((current, segment, index) => {
    const parentPath = segments.slice(0, index).join('.') || '<root>';

    if (typeof current !== 'object' || current === null) {
      throw new Error(`Cannot read property "${segment}" of ${String(current)} at "${parentPath}"`);
    }

    if (!(segment in current)) {
      throw new Error(`Property "${segment}" does not exist at "${parentPath}"`);
    }

    return Reflect.get(current, segment);
  }, target);
}
