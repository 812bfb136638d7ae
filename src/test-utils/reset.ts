/**
 * Test Utilities - Unified Reset
 *
 * Provides a single function to reset all process-wide caches for test
 * isolation: the loaded environment, the merged config and the shared
 * Azure credential.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { _clearConfigCache, _clearEnvCache } from '../config/index.js';
import { _resetSharedCredential } from '../providers/credential.js';

/**
 * Reset all application singletons for test isolation.
 *
 * Safe to call multiple times.
 */
export function resetAll(): void {
  _clearEnvCache();
  _clearConfigCache();
  _resetSharedCredential();
}
