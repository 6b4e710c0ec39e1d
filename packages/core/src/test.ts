// Re-export everything
export * from './index';

// Test utilities (below)
export {
  FakePool,
  FakePoolFactory,
  MemoryAccessStore,
  centralDescriptor,
  plantDescriptor,
  type FakeBehavior,
  type QueryHandler,
} from './test/fakes';
