/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase: cache reset,
 * configuration and document fixtures, in-process collaborators and a
 * recording tracer.
 *
 * @example
 * ```typescript
 * import { createTestConfig, FakeSearchCollaborator } from '../test-utils/index.js';
 *
 * const search = new FakeSearchCollaborator([createRecord()]);
 * ```
 */

export { resetAll } from './reset.js';
export {
  createTestConfig,
  createDocument,
  createRecord,
  TEST_SEARCH_ENDPOINT,
  TEST_OPENAI_ENDPOINT,
} from './fixtures.js';
export {
  FakeSearchCollaborator,
  FakeGenerationCollaborator,
  FAKE_COMPLETION,
  type FakeGenerationOptions,
} from './fakes.js';
export { RecordingTracer, type RecordedSpan, type RecordedEvent } from './recording-tracer.js';
