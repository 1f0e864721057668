import type { ObjectLiteral } from 'typeorm';

export const TypeormFixtureStoreEvents = {
  /** A lookup query has been built and is about to run */
  QUERY_BUILT: 'queryBuilt',
  /** An entity has been saved and reloaded from the database */
  PERSISTED: 'persisted',
} as const;

export type TypeormFixtureStoreEvents = (typeof TypeormFixtureStoreEvents)[keyof typeof TypeormFixtureStoreEvents];

export type TypeormFixtureStoreEventsMap = {
  [TypeormFixtureStoreEvents.QUERY_BUILT]: [{ query: string; parameters: ObjectLiteral; timestamp: Date }];
  [TypeormFixtureStoreEvents.PERSISTED]: [{ entity: object; persistedAt: Date }];
};
