export {
  FixtureRegistry,
  type FixtureMappingBase,
  type FixtureType,
  type FixtureTypes,
} from './fixture-registry';
export { FixtureRegistryEvents, type FixtureRegistryEventsMap } from './events';
export type { CreateInput, DataCreator } from './data-creator';
export { attachToScenario, type ScenarioHooks } from './scenario-hooks';
export {
  findPlaceholders,
  formatPlaceholderValue,
  PLACEHOLDER_PATTERN,
  replacePlaceholders,
  type Placeholder,
} from './placeholders';

export {
  describeDataClass,
  type Criteria,
  type DataClass,
  type FixtureStore,
  type Identifier,
} from './store';
export { isPlainObject, readPropertyPath } from './utils/object-utils';
