import type { FixtureMappingBase, FixtureRegistry, FixtureType } from './fixture-registry';
import type { DataClass } from './store';

export type CreateInput<FixtureMapping extends FixtureMappingBase> = {
  /** Identifier the scenario refers to the data by, if it named one */
  id: string | undefined;
  /** Extra arguments given to getOrCreate after the identifier */
  params: unknown[];
  /** Registry the created data must be registered with */
  registry: FixtureRegistry<FixtureMapping>;
};

/**
 * Knows how to build one type of test data.
 * The creator is responsible for registering what it builds, usually through
 * `registry.persistAndRegisterCreated`.
 */
export type DataCreator<
  FixtureMapping extends FixtureMappingBase,
  Type extends FixtureType<FixtureMapping> = FixtureType<FixtureMapping>,
> = {
  /** Canonical type name first, then the aliases scenario text may use for it */
  names: readonly [Type, ...string[]];
  /** Class the data is persisted as */
  dataClass: DataClass;
  create: (input: CreateInput<FixtureMapping>) => Promise<void> | void;
};
