import 'reflect-metadata';

export { buildAssociationQuery } from './association-query';
export { TypeormFixtureStoreEvents, type TypeormFixtureStoreEventsMap } from './events';
export { TypeormFixtureStore, type TypeormFixtureStoreConfig } from './typeorm-fixture-store';
