import { AssertionError } from 'node:assert';
import { EventEmitter } from 'node:events';

import type { DataCreator } from './data-creator';
import { FixtureRegistryEvents, type FixtureRegistryEventsMap } from './events';
import { replacePlaceholders } from './placeholders';
import { type Criteria, type DataClass, describeDataClass, type FixtureStore, type Identifier } from './store';
import { readPropertyPath } from './utils/object-utils';

export type FixtureMappingBase = Record<string, unknown>;

export type FixtureType<FixtureMapping extends FixtureMappingBase> = Extract<keyof FixtureMapping, string>;

/**
 * A single type name, or the concrete type followed by the abstract types the data also counts as.
 * Untyped registries also take the list as one comma-separated string, e.g. `"employee, person"`.
 */
export type FixtureTypes<Type extends string, AnyType extends string> = Type | readonly [Type, ...AnyType[]];

/**
 * Keeps track of the data created during a scenario.
 *
 * Data is registered under a type name and the identifier the scenario text uses
 * for it ("previously created"), and becomes the latest data of that type
 * ("recently created"). Reads go through the store so the returned entities
 * reflect what is currently persisted, not what the registry saw at creation.
 *
 * @param store - The store used to persist, refresh and look data up.
 */
export class FixtureRegistry<
  FixtureMapping extends FixtureMappingBase = FixtureMappingBase,
> extends EventEmitter<FixtureRegistryEventsMap> {
  private readonly store: FixtureStore;
  private readonly recentlyCreated: Map<string, unknown> = new Map();
  private readonly previouslyCreated: Map<string, Map<string, unknown>> = new Map();
  private readonly creators: Map<string, DataCreator<FixtureMapping>> = new Map();
  private readonly canonicalTypeNames: Map<string, FixtureType<FixtureMapping>> = new Map();

  constructor(store: FixtureStore) {
    super();

    this.store = store;
  }

  public registerCreator<Type extends FixtureType<FixtureMapping>>(creator: DataCreator<FixtureMapping, Type>): void {
    const [canonicalName] = creator.names;

    for (const name of creator.names) {
      if (this.canonicalTypeNames.has(name)) {
        throw new Error(`Data creator for type name "${name}" already exists`);
      }
    }

    this.creators.set(canonicalName, creator);

    for (const name of creator.names) {
      this.canonicalTypeNames.set(name, canonicalName);
    }
  }

  /**
   * Returns the data registered under `id`, or the most recent data of the type
   * when no `id` is given, running the type's data creator first when there is none.
   *
   * @param params - Extra arguments handed to the data creator
   */
  public async getOrCreate<Type extends FixtureType<FixtureMapping>>(
    type: Type,
    id?: string,
    ...params: unknown[]
  ): Promise<FixtureMapping[Type]> {
    const creator = this.creators.get(type);

    if (!creator) {
      throw new Error(`No data creator registered for type "${type}"`);
    }

    const missing = id ? !this.hasPreviouslyCreated(type, id) : !this.hasRecentlyCreated(type);

    if (missing) {
      await creator.create({ id, params, registry: this });

      this.emit(FixtureRegistryEvents.CREATED, { type, id, createdAt: new Date() });
    }

    return id ? this.getPreviouslyCreated(type, id) : this.getRecentlyCreated(type);
  }

  /**
   * Persists an entity, reloads it from storage and registers it.
   *
   * @param data - Property values assigned before saving
   */
  public async persistAndRegisterCreated<Type extends FixtureType<FixtureMapping>>(
    types: FixtureTypes<Type, FixtureType<FixtureMapping>>,
    id: string,
    entity: FixtureMapping[Type] & object,
    data: Record<string, unknown> = {},
  ): Promise<FixtureMapping[Type]> {
    this.assertNotRegistered(this.toTypeList(types), id);

    await this.store.persist(entity, data);

    return this.registerPreviouslyCreated(types, id, entity);
  }

  /**
   * @throws when any of the types already has data registered under `id`
   */
  public registerPreviouslyCreated<Type extends FixtureType<FixtureMapping>>(
    types: FixtureTypes<Type, FixtureType<FixtureMapping>>,
    id: string,
    data: FixtureMapping[Type],
  ): FixtureMapping[Type] {
    const typeList = this.toTypeList(types);

    this.assertNotRegistered(typeList, id);

    for (const type of typeList) {
      const byId = this.previouslyCreated.get(type) ?? new Map<string, unknown>();

      byId.set(id, data);
      this.previouslyCreated.set(type, byId);
      this.recentlyCreated.set(type, data);
    }

    this.emit(FixtureRegistryEvents.REGISTERED, { types: typeList, id, registeredAt: new Date() });

    return data;
  }

  public hasPreviouslyCreated(type: FixtureType<FixtureMapping>, id: string): boolean {
    return this.previouslyCreated.get(type)?.has(id) ?? false;
  }

  public async getPreviouslyCreated<Type extends FixtureType<FixtureMapping>>(
    type: Type,
    id: string,
  ): Promise<FixtureMapping[Type]> {
    const byId = this.previouslyCreated.get(type);

    if (!byId?.has(id)) {
      throw new Error(`No data of type "${type}" has been registered with ID "${id}"`);
    }

    return this.store.ensureManaged(byId.get(id) as FixtureMapping[Type]);
  }

  public hasRecentlyCreated(type: FixtureType<FixtureMapping>): boolean {
    return this.recentlyCreated.has(type);
  }

  public async getRecentlyCreated<Type extends FixtureType<FixtureMapping>>(type: Type): Promise<FixtureMapping[Type]> {
    if (!this.recentlyCreated.has(type)) {
      throw new Error(`Recently created data of type "${type}" was requested, but none has been registered`);
    }

    return this.store.ensureManaged(this.recentlyCreated.get(type) as FixtureMapping[Type]);
  }

  /**
   * Replaces placeholders such as `{id person "alice"}` or
   * `{address.street of person "alice"}` with the field of the data registered
   * under that identifier. Any name variant of a type may be used.
   */
  public async fillDataPlaceholders(text: string): Promise<string> {
    return replacePlaceholders(text, async ({ field, type, id }) => {
      const data = await this.getPreviouslyCreated(this.getCanonicalTypeName(type), id);

      return readPropertyPath(data, field);
    });
  }

  public async seeItemInRepository(type: string, criteria: Criteria): Promise<void> {
    const dataClass = this.getDataClass(type);
    const count = await this.store.count(dataClass, criteria);

    if (count === 0) {
      throw new AssertionError({
        message: `Expected ${describeDataClass(dataClass)} with ${JSON.stringify(criteria)} to be in the repository`,
        actual: count,
        operator: 'seeItemInRepository',
      });
    }
  }

  public async dontSeeItemInRepository(type: string, criteria: Criteria): Promise<void> {
    const dataClass = this.getDataClass(type);
    const count = await this.store.count(dataClass, criteria);

    if (count > 0) {
      throw new AssertionError({
        message: `Expected ${describeDataClass(dataClass)} with ${JSON.stringify(criteria)} not to be in the repository, found ${count}`,
        actual: count,
        operator: 'dontSeeItemInRepository',
      });
    }
  }

  /**
   * Loads a fresh copy of registered data straight from storage. Useful when a
   * check needs more than equality on columns, e.g. the length of a JSON array.
   *
   * @param id - Identifier of the data; the recently created data of the type when omitted
   */
  public async getItemFromRepository(type: string, id?: string): Promise<object> {
    const { dataClass, identifier } = await this.locateStoredItem(type, id);

    return this.store.findOne(dataClass, identifier);
  }

  public async getItemFieldFromRepository(type: string, id: string | undefined, field: string): Promise<unknown> {
    const { dataClass, identifier } = await this.locateStoredItem(type, id);

    return this.store.findField(dataClass, identifier, field);
  }

  public getIdentifierParams(entity: object): Identifier {
    return this.store.getIdentifier(entity);
  }

  public reset(): void {
    this.recentlyCreated.clear();
    this.previouslyCreated.clear();

    this.emit(FixtureRegistryEvents.RESET, { timestamp: new Date() });
  }

  private async locateStoredItem(
    type: string,
    id: string | undefined,
  ): Promise<{ dataClass: DataClass; identifier: Identifier }> {
    const canonicalType = this.getCanonicalTypeName(type);
    const dataClass = this.getDataClass(canonicalType);
    const entity = id
      ? await this.getPreviouslyCreated(canonicalType, id)
      : await this.getRecentlyCreated(canonicalType);

    if (typeof entity !== 'object' || entity === null) {
      throw new Error(`Data of type "${canonicalType}" is not an entity and cannot be loaded from the repository`);
    }

    return { dataClass, identifier: this.store.getIdentifier(entity) };
  }

  private getDataClass(type: string): DataClass {
    const canonicalType = this.getCanonicalTypeName(type);
    const creator = this.creators.get(canonicalType);

    if (!creator) {
      throw new Error(`No data creator registered for type "${canonicalType}"`);
    }

    return creator.dataClass;
  }

  private getCanonicalTypeName(name: string): FixtureType<FixtureMapping> {
    const canonicalName = this.canonicalTypeNames.get(name);

    if (!canonicalName) {
      throw new Error(
        `Cannot normalize unknown type name "${name}". The data creator for this type may be missing it as an alias.`,
      );
    }

    return canonicalName;
  }

  private toTypeList(types: string | readonly string[]): string[] {
    if (typeof types !== 'string') {
      return [...types];
    }

    return types
      .split(',')
      .map((type) => type.trim())
      .filter((type) => type.length > 0);
  }

  private assertNotRegistered(types: string[], id: string): void {
    for (const type of types) {
      if (this.previouslyCreated.get(type)?.has(id)) {
        throw new Error(`Data of type "${type}" has already been registered with ID "${id}"`);
      }
    }
  }
}
