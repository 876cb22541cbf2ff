/**
 * Test doubles.
 */

export { createManualClock, type ManualClock } from './clock.mock.js';
export { createScriptedUpstream, testTarget, type ScriptStep } from './upstream.mock.js';
