export { DetectionLoop } from './detection-loop.js';
export type { LoopStatus } from './detection-loop.js';
export { runDetectionCycle, buildCatalog, diffNewItems } from './detector.js';
export type { CycleResult, DetectionContext, LoopState } from './detector.js';
export { evaluateItem, tallyExclusions } from './eligibility.js';
export { classifyPurchaseError } from './error-classifier.js';
export { prioritizeItems } from './prioritizer.js';
export { acquireItem, affordableQuantity } from './purchase-orchestrator.js';
export type { PurchaseContext, AcquisitionRequest } from './purchase-orchestrator.js';
export { createPurchaseLimiter, MIN_PURCHASE_SPACING_MS } from './purchase-limiter.js';
export { matchRange } from './range-matcher.js';
export type * from './types.js';
