export const FixtureRegistryEvents = {
  /** Data has been registered under one or more type names */
  REGISTERED: 'registered',
  /** A data creator ran because the requested data did not exist yet */
  CREATED: 'created',
  /** Both registries have been cleared at the end of a scenario */
  RESET: 'reset',
} as const;

export type FixtureRegistryEvents = (typeof FixtureRegistryEvents)[keyof typeof FixtureRegistryEvents];

export type FixtureRegistryEventsMap = {
  [FixtureRegistryEvents.REGISTERED]: [{ types: string[]; id: string; registeredAt: Date }];
  [FixtureRegistryEvents.CREATED]: [{ type: string; id: string | undefined; createdAt: Date }];
  [FixtureRegistryEvents.RESET]: [{ timestamp: Date }];
};
