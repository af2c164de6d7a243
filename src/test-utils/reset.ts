/**
 * Clears the process-wide caches that would otherwise leak between tests:
 * BM25 indexes keyed by index handle, and the memoised environment.
 *
 * @example
 * ```typescript
 * beforeEach(() => {
 *   vi.stubEnv('HIX_HOME', tempHome);
 *   resetAll();
 * });
 * ```
 */

import { resetBM25StoreManager } from '../search/index.js';
import { _clearEnvCache } from '../config/env.js';

export function resetAll(): void {
  resetBM25StoreManager();
  _clearEnvCache();
}
