import { randomUUID } from 'crypto';
import { RunContext } from '../types/run';

export function createRunContext(now: Date = new Date()): RunContext {
  return { runId: randomUUID(), startedAt: now };
}
