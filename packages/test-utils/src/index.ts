export * from './mock-factories.js';
export * from './fake-relay.js';
