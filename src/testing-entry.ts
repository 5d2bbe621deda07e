/**
 * burstgate/testing
 *
 * Deterministic test clock for limiter tests.
 */

export { type TestClock, createTestClock } from "./testing";
