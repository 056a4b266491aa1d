/**
 * Let every pending promise chain settle. Uses setImmediate, so tests that
 * fake timers must leave it real: jest.useFakeTimers({ doNotFake: ['setImmediate'] }).
 */
export const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
