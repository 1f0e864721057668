export { MemoryFixtureStore, type MemoryFixtureStoreConfig } from './memory-fixture-store';
