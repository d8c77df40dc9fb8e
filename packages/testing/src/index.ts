/**
 * @fileoverview Test doubles and fixtures for PlayHub packages.
 */

export {
  addTestVersion,
  createTestCore,
  localManifest,
  type PublishOptions,
  publishGame,
  registerPlayers,
  serverManifest,
  TEST_PUBLIC_HOST,
  TEST_RUNTIME_ROOT,
  type TestCore,
} from './fixtures.js';
export { createMockBlobStore, type MockBlobStore } from './mockBlobStore.js';
export {
  createMockProcessHost,
  type MockProcessHandle,
  type MockProcessHost,
} from './mockProcessHost.js';
