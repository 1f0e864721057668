import { EventEmitter } from 'node:events';

import {
  type Criteria,
  type DataClass,
  describeDataClass,
  type FixtureStore,
  type Identifier,
} from '@fixture-ledger/core';
import type { DataSource, EntityManager, ObjectLiteral, SelectQueryBuilder } from 'typeorm';

import { buildAssociationQuery } from './association-query';
import { TypeormFixtureStoreEvents, type TypeormFixtureStoreEventsMap } from './events';

const DEFAULT_ROOT_ALIAS = 's';

const isObject = (value: unknown): value is object => typeof value === 'object' && value !== null;

export type TypeormFixtureStoreConfig = {
  /** Alias of the root entity in lookup queries. Joined relations are aliased `${alias}_${property}`. */
  rootAlias?: string;

  /**
   * EntityManager to run all operations through, e.g. the one shared with the
   * application under test or one bound to a transaction.
   * The DataSource's manager is used when omitted.
   */
  entityManager?: EntityManager;
};

/**
 * Fixture store backed by a TypeORM DataSource.
 *
 * TypeORM keeps no identity map, so "managing" an entity here means reloading
 * it by identifier and merging the loaded state into the registered instance.
 * Lookups never use the query result cache.
 */
export class TypeormFixtureStore extends EventEmitter<TypeormFixtureStoreEventsMap> implements FixtureStore {
  private readonly rootAlias: string;
  private readonly entityManager: EntityManager | undefined;
  private dataSource: DataSource | undefined;
  private dataSourceResolvers: Array<(ds: DataSource) => void> = [];

  constructor(config?: TypeormFixtureStoreConfig) {
    super();

    this.rootAlias = config?.rootAlias ?? DEFAULT_ROOT_ALIAS;
    this.entityManager = config?.entityManager;
  }

  /**
   * Initializes the store with a TypeORM DataSource.
   * Operations started before this call wait for it.
   */
  async initialize(dataSource: DataSource): Promise<void> {
    if (this.dataSource) {
      throw new Error('DataSource already initialized');
    }

    this.dataSource = dataSource;

    const resolvers = this.dataSourceResolvers.splice(0);
    for (const resolve of resolvers) {
      resolve(dataSource);
    }
  }

  private async getDataSource(): Promise<DataSource> {
    if (this.dataSource) {
      return this.dataSource;
    }

    return new Promise<DataSource>((resolve) => {
      this.dataSourceResolvers.push(resolve);
    });
  }

  private async getManager(): Promise<EntityManager> {
    const dataSource = await this.getDataSource();

    return this.entityManager ?? dataSource.manager;
  }

  private getInitializedManager(): EntityManager {
    if (this.entityManager) {
      return this.entityManager;
    }

    if (!this.dataSource) {
      throw new Error('DataSource not initialized');
    }

    return this.dataSource.manager;
  }

  async persist(entity: object, data: Record<string, unknown> = {}): Promise<void> {
    const manager = await this.getManager();

    Object.assign(entity, data);
    await manager.save(entity);
    await this.reload(manager, entity);

    this.emit(TypeormFixtureStoreEvents.PERSISTED, { entity, persistedAt: new Date() });
  }

  async ensureManaged<T>(data: T): Promise<T> {
    if (typeof data !== 'object' || data === null) {
      return data;
    }

    const manager = await this.getManager();

    // plain objects, arrays and classes TypeORM does not map are not entities
    if (!manager.connection.hasMetadata(data.constructor)) {
      return data;
    }

    await this.reload(manager, data);

    return data;
  }

  async count(dataClass: DataClass, criteria: Criteria): Promise<number> {
    const qb = await this.createLookupQuery(dataClass, criteria);

    return qb.getCount();
  }

  async findOne(dataClass: DataClass, identifier: Identifier): Promise<object> {
    const qb = await this.createLookupQuery(dataClass, identifier);
    const entities = await qb.getMany();
    const [entity] = entities;

    if (entities.length !== 1 || !entity) {
      throw new Error(this.buildAmbiguousLookupMessage(dataClass, identifier, entities.length));
    }

    return entity;
  }

  async findField(dataClass: DataClass, identifier: Identifier, field: string): Promise<unknown> {
    const qb = await this.createLookupQuery(dataClass, identifier, (query) =>
      query.select(`${this.rootAlias}.${field}`, 'value'),
    );
    const rows = await qb.getRawMany<{ value: unknown }>();
    const [row] = rows;

    if (rows.length !== 1 || !row) {
      throw new Error(this.buildAmbiguousLookupMessage(dataClass, identifier, rows.length));
    }

    return row.value;
  }

  getIdentifier(entity: object): Identifier {
    const metadata = this.getInitializedManager().connection.getMetadata(entity.constructor);
    const identifier = metadata.getEntityIdMap(entity);

    if (!identifier) {
      throw new Error(`${metadata.name} has no identifier values`);
    }

    return identifier;
  }

  /**
   * Loads the entity's row again and merges it into the same instance.
   * Owning relations set on the instance are loaded with it. A related instance
   * that still refers to the same row is kept, anything else is replaced with
   * the loaded entity or `null`.
   * An instance whose row no longer exists is left as it is.
   */
  private async reload(manager: EntityManager, entity: object): Promise<void> {
    const metadata = manager.connection.getMetadata(entity.constructor);
    const identifier = metadata.getEntityIdMap(entity);

    if (!identifier) {
      throw new Error(`Cannot reload ${metadata.name} without identifier values`);
    }

    const relations = metadata.relations.filter(
      (relation) =>
        (relation.isManyToOne || relation.isOneToOneOwner) && !relation.isLazy && relation.getEntityValue(entity) !== undefined,
    );

    const qb = buildAssociationQuery(
      manager.createQueryBuilder(metadata.target, this.rootAlias).cache(false),
      metadata,
      this.rootAlias,
      identifier,
    );

    for (const relation of relations) {
      qb.leftJoinAndSelect(`${this.rootAlias}.${relation.propertyPath}`, this.loadedRelationAlias(relation.propertyPath));
    }

    this.emitQuery(qb);

    const fresh = await qb.getOne();

    if (!fresh) {
      return;
    }

    const loadedRelations = relations.map((relation) => {
      const loaded: unknown = relation.getEntityValue(fresh);

      // merge would copy the loaded state into the related instance currently set
      relation.setEntityValue(fresh, undefined);

      return { relation, loaded };
    });

    manager.merge(metadata.target, entity, fresh);

    for (const { relation, loaded } of loadedRelations) {
      const current: unknown = relation.getEntityValue(entity);
      const related = relation.inverseEntityMetadata;

      if (isObject(current) && isObject(loaded) && related.compareEntities(current, loaded)) {
        continue;
      }

      relation.setEntityValue(entity, loaded ?? null);
    }
  }

  private loadedRelationAlias(propertyPath: string): string {
    return `${this.rootAlias}_loaded_${propertyPath}`.replace(/\./g, '');
  }

  private async createLookupQuery(
    dataClass: DataClass,
    criteria: Criteria,
    select?: (qb: SelectQueryBuilder<ObjectLiteral>) => SelectQueryBuilder<ObjectLiteral>,
  ): Promise<SelectQueryBuilder<ObjectLiteral>> {
    const manager = await this.getManager();
    const metadata = manager.connection.getMetadata(dataClass);
    const root = manager.createQueryBuilder(metadata.target, this.rootAlias).cache(false);
    const qb = buildAssociationQuery(select ? select(root) : root, metadata, this.rootAlias, criteria);

    this.emitQuery(qb);

    return qb;
  }

  private emitQuery(qb: SelectQueryBuilder<ObjectLiteral>): void {
    this.emit(TypeormFixtureStoreEvents.QUERY_BUILT, {
      query: qb.getQuery(),
      parameters: qb.getParameters(),
      timestamp: new Date(),
    });
  }

  private buildAmbiguousLookupMessage(dataClass: DataClass, identifier: Identifier, found: number): string {
    return `Expected exactly one ${describeDataClass(dataClass)} matching ${JSON.stringify(identifier)}, found ${found}`;
  }
}
