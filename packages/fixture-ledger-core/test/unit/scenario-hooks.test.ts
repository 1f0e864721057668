import { describe, expect, test, vitest } from 'vitest';
import { mock } from 'vitest-mock-extended';

import { FixtureRegistry } from '../../src/fixture-registry';
import { attachToScenario, type ScenarioHooks } from '../../src/scenario-hooks';
import type { FixtureStore } from '../../src/store';

describe('attachToScenario', () => {
  test('resets the registry after each scenario', async () => {
    const registry = new FixtureRegistry<{ person: { name: string } }>(mock<FixtureStore>());
    const afterEach = vitest.fn<ScenarioHooks['afterEach']>();

    attachToScenario(registry, { afterEach });
    registry.registerPreviouslyCreated('person', 'alice', { name: 'Alice' });

    expect(afterEach).toHaveBeenCalledOnce();

    const [handler] = afterEach.mock.calls[0];
    await handler();

    expect(registry.hasPreviouslyCreated('person', 'alice')).toBe(false);
    expect(registry.hasRecentlyCreated('person')).toBe(false);
  });

  test('returns the registry it was given', () => {
    const registry = new FixtureRegistry(mock<FixtureStore>());

    expect(attachToScenario(registry, { afterEach: vitest.fn() })).toBe(registry);
  });
});
