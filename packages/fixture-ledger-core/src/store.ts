/** A persisted class, or the entity name the ORM knows it by. */
export type DataClass = string | (new (...args: never[]) => object);

/**
 * Property values to look stored rows up by. A nested plain object under an
 * association property holds criteria for the associated entity.
 */
export type Criteria = { [property: string]: unknown };

/** Identifier property values of an entity, e.g. `{ id: 1 }`. */
export type Identifier = { [property: string]: unknown };

export interface FixtureStore {
  /**
   * Assigns `data` onto the entity, saves it and reloads it from storage so the
   * instance holds the values as the application under test would read them.
   */
  persist(entity: object, data?: Record<string, unknown>): Promise<void>;
  /**
   * Brings an entity known to the store back in sync with storage.
   * Values the store does not manage are returned unchanged.
   */
  ensureManaged<T>(data: T): Promise<T>;
  count(dataClass: DataClass, criteria: Criteria): Promise<number>;
  /** Loads a fresh instance; exactly one stored row must match. */
  findOne(dataClass: DataClass, identifier: Identifier): Promise<object>;
  /** Reads the raw stored value of one field; exactly one stored row must match. */
  findField(dataClass: DataClass, identifier: Identifier, field: string): Promise<unknown>;
  getIdentifier(entity: object): Identifier;
}

export function describeDataClass(dataClass: DataClass): string {
  return typeof dataClass === 'string' ? dataClass : dataClass.name;
}
