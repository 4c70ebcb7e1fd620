/**
 * Test Utilities Module
 *
 * Shared factories for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { makeMetrics, makeReport } from '../../test-utils/index.js';
 *
 * const report = makeReport(makeMetrics({ mrr: 0.5 }));
 * ```
 */

export { makeMetrics, makeReport } from './factories.js';
