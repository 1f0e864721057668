import type { FixtureMappingBase, FixtureRegistry } from './fixture-registry';

/**
 * The part of a test runner's API used to tie the registry to a scenario.
 * Vitest's, Jest's and Mocha's `afterEach` all fit.
 */
export type ScenarioHooks = {
  afterEach(handler: () => Promise<void> | void): void;
};

/**
 * Clears the registry after every scenario so identifiers can be reused.
 */
export function attachToScenario<FixtureMapping extends FixtureMappingBase>(
  registry: FixtureRegistry<FixtureMapping>,
  hooks: ScenarioHooks,
): FixtureRegistry<FixtureMapping> {
  hooks.afterEach(() => {
    registry.reset();
  });

  return registry;
}
