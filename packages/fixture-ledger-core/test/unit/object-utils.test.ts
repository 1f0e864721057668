import { describe, expect, test } from 'vitest';

import { isPlainObject, readPropertyPath } from '../../src/utils/object-utils';

describe('isPlainObject', () => {
  test('accepts object literals and null-prototype objects', () => {
    expect(isPlainObject({ name: 'Alice' })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
  });

  test('rejects arrays, dates, class instances and primitives', () => {
    class Company {}

    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject(new Company())).toBe(false);
    expect(isPlainObject('Alice')).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });
});

describe('readPropertyPath', () => {
  const person = { name: 'Alice', address: { street: 'Main Street', city: 'Lisbon' }, manager: null };

  test('reads a top level property', () => {
    expect(readPropertyPath(person, 'name')).toBe('Alice');
  });

  test('reads a nested property', () => {
    expect(readPropertyPath(person, 'address.street')).toBe('Main Street');
  });

  test('reads accessors defined on the prototype', () => {
    class Account {
      get label(): string {
        return 'primary';
      }
    }

    expect(readPropertyPath(new Account(), 'label')).toBe('primary');
  });

  test('throws when a property does not exist', () => {
    expect(() => readPropertyPath(person, 'phone')).toThrow('Property "phone" does not exist at "<root>"');
    expect(() => readPropertyPath(person, 'address.zip')).toThrow('Property "zip" does not exist at "address"');
  });

  test('throws when an intermediate value is not an object', () => {
    expect(() => readPropertyPath(person, 'manager.name')).toThrow(
      'Cannot read property "name" of null at "manager"',
    );
  });
});
