import {
  type Criteria,
  type DataClass,
  describeDataClass,
  type FixtureStore,
  type Identifier,
  isPlainObject,
} from '@fixture-ledger/core';

const DEFAULT_IDENTIFIER_PROPERTY = 'id';

type Row = Record<string, unknown>;

type Table = {
  prototype: object;
  name: string;
  rows: Map<string, Row>;
};

type StoredLocation = {
  table: Table;
  key: string;
};

export type MemoryFixtureStoreConfig = {
  /**
   * Property holding the identifier of stored entities
   *
   * @default 'id'
   */
  identifierProperty?: string;
};

/**
 * Keeps persisted fixtures in memory, one table per class.
 * Rows are shallow snapshots taken when an entity is persisted, so later changes
 * to the instance are not visible until it is persisted again.
 */
export class MemoryFixtureStore implements FixtureStore {
  private tables: Map<unknown, Table>;
  private persisted: WeakMap<object, StoredLocation>;
  private nextId: number;
  private config: Required<MemoryFixtureStoreConfig>;

  constructor(config?: MemoryFixtureStoreConfig) {
    this.tables = new Map();
    this.persisted = new WeakMap();
    this.nextId = 1;
    this.config = {
      identifierProperty: config?.identifierProperty ?? DEFAULT_IDENTIFIER_PROPERTY,
    };
  }

  /**
   * Assigns the data, allocates an identifier when the entity has none and
   * stores a snapshot of the entity.
   */
  async persist(entity: object, data: Record<string, unknown> = {}): Promise<void> {
    Object.assign(entity, data);

    const { identifierProperty } = this.config;
    const currentId: unknown = Reflect.get(entity, identifierProperty);

    if (currentId === undefined || currentId === null) {
      Reflect.set(entity, identifierProperty, this.nextId++);
    }

    const table = this.getOrCreateTable(entity);
    const snapshot: Row = Object.fromEntries(Object.entries(entity));
    const key = this.identifierKey(entity);

    table.rows.set(key, snapshot);
    this.persisted.set(entity, { table, key });
  }

  async ensureManaged<T>(data: T): Promise<T> {
    if (typeof data !== 'object' || data === null) {
      return data;
    }

    // instances persisted by this store only
    const location = this.persisted.get(data);
    const row = location?.table.rows.get(location.key);

    if (row) {
      Object.assign(data, row);
    }

    return data;
  }

  async count(dataClass: DataClass, criteria: Criteria): Promise<number> {
    return this.findRows(dataClass, criteria).length;
  }

  async findOne(dataClass: DataClass, identifier: Identifier): Promise<object> {
    const row = this.findSingleRow(dataClass, identifier);
    const table = this.getTable(dataClass);

    return Object.assign(Object.create(table.prototype), row);
  }

  async findField(dataClass: DataClass, identifier: Identifier, field: string): Promise<unknown> {
    const row = this.findSingleRow(dataClass, identifier);

    if (!(field in row)) {
      throw new Error(`${describeDataClass(dataClass)} has no stored field "${field}"`);
    }

    return row[field];
  }

  getIdentifier(entity: object): Identifier {
    const { identifierProperty } = this.config;

    return { [identifierProperty]: Reflect.get(entity, identifierProperty) };
  }

  private findSingleRow(dataClass: DataClass, identifier: Identifier): Row {
    const rows = this.findRows(dataClass, identifier);
    const [row] = rows;

    if (rows.length !== 1 || !row) {
      throw new Error(
        `Expected exactly one ${describeDataClass(dataClass)} matching ${JSON.stringify(identifier)}, found ${rows.length}`,
      );
    }

    return row;
  }

  private findRows(dataClass: DataClass, criteria: Criteria): Row[] {
    const table = this.findTable(dataClass);

    if (!table) {
      return [];
    }

    return Array.from(table.rows.values()).filter((row) => this.matches(row, criteria));
  }

  private matches(subject: object, criteria: Criteria): boolean {
    return Object.entries(criteria).every(([property, expected]) => {
      const actual: unknown = Reflect.get(subject, property);

      if (expected === null) {
        return actual === null || actual === undefined;
      }

      if (Array.isArray(expected)) {
        return JSON.stringify(actual) === JSON.stringify(expected);
      }

      if (isPlainObject(expected)) {
        return typeof actual === 'object' && actual !== null && this.matches(actual, expected);
      }

      if (typeof actual === 'object' && actual !== null && !(actual instanceof Date)) {
        // related entity compared by identifier, given either as an instance or as a scalar
        const expectedKey = typeof expected === 'object' ? this.identifierKey(expected) : String(expected);

        return this.identifierKey(actual) === expectedKey;
      }

      if (actual instanceof Date && expected instanceof Date) {
        return actual.getTime() === expected.getTime();
      }

      return actual === expected;
    });
  }

  private identifierKey(entity: object): string {
    return String(Reflect.get(entity, this.config.identifierProperty));
  }

  private getOrCreateTable(entity: object): Table {
    const existing = this.tables.get(entity.constructor);

    if (existing) {
      return existing;
    }

    const table: Table = {
      prototype: Object.getPrototypeOf(entity),
      name: entity.constructor.name,
      rows: new Map(),
    };

    this.tables.set(entity.constructor, table);

    return table;
  }

  private findTable(dataClass: DataClass): Table | undefined {
    if (typeof dataClass !== 'string') {
      return this.tables.get(dataClass);
    }

    return Array.from(this.tables.values()).find((table) => table.name === dataClass);
  }

  private getTable(dataClass: DataClass): Table {
    const table = this.findTable(dataClass);

    if (!table) {
      throw new Error(`Nothing of ${describeDataClass(dataClass)} has been persisted`);
    }

    return table;
  }
}
