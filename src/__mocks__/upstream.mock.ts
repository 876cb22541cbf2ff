import { vi } from 'vitest';
import type { CallContext, UpstreamResponse } from '../governor/governor.js';
import type { UpstreamTarget } from '../types/index.js';

/**
 * One scripted outcome: a response to return or an error to throw.
 */
export type ScriptStep<T> = UpstreamResponse<T> | Error;

/**
 * Upstream call whose behaviour per identity follows a script. Each
 * invocation takes the next step; the last step repeats once the script
 * runs out. Identities without a script answer `ok from <identity>`.
 */
export function createScriptedUpstream(script: Record<string, ScriptStep<string>[]> = {}) {
  const positions = new Map<string, number>();

  return vi.fn(async (target: UpstreamTarget, _context: CallContext): Promise<UpstreamResponse<string>> => {
    const steps = script[target.identity];
    if (!steps || steps.length === 0) {
      return { content: `ok from ${target.identity}` };
    }
    const position = positions.get(target.identity) ?? 0;
    positions.set(target.identity, position + 1);
    const step = steps[Math.min(position, steps.length - 1)];
    if (step instanceof Error) {
      throw step;
    }
    if (!step) {
      throw new Error(`No scripted step for ${target.identity}`);
    }
    return step;
  });
}

/**
 * Target with a recognisable test endpoint.
 */
export function testTarget(identity: string): UpstreamTarget {
  return { identity, endpoint: `https://${identity}.test/v1` };
}
