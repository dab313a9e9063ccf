// Mock TTS Service
// Scripted remote sessions: each send resolves or fails according to a plan

import { vi } from 'vitest';
import type { ITTSSession, ITTSSessionFactory, SendRequest } from '@/services/interfaces';
import { HardLimitError, RetriableError } from '@/errors';

export type SendBehavior = 'ok' | 'transient' | 'hard-limit' | 'crash' | 'hang';

export interface SendContext {
  workerId: number;
  index: number;
  /** Calls for this unit so far, this one included */
  call: number;
  /** Successful sends of this session since its last hard limit */
  sessionSuccesses: number;
}

export type SendPlanner = (context: SendContext) => SendBehavior;

export interface SentRequest {
  workerId: number;
  index: number;
  requestId: string;
  text: string;
}

function indexFromRequestId(requestId: string): number {
  const match = /-u(\d+)-/.exec(requestId);
  if (!match) throw new Error(`Unexpected request id ${requestId}`);
  return Number(match[1]);
}

export function audioFor(index: number): Uint8Array {
  return new Uint8Array([index % 256, 0x49, 0x44, 0x33]);
}

function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    const abort = () => reject(new DOMException('The operation was aborted', 'AbortError'));
    if (signal?.aborted) abort();
    signal?.addEventListener('abort', abort, { once: true });
  });
}

export class MockSessionFactory implements ITTSSessionFactory {
  readonly sent: SentRequest[] = [];
  readonly closed: number[] = [];
  private readonly callsPerUnit = new Map<number, number>();
  private readonly unitPlans = new Map<number, SendBehavior[]>();
  private planner: SendPlanner = () => 'ok';

  /**
   * Successive behaviors for one unit; calls past the list succeed
   */
  planUnit(index: number, ...behaviors: SendBehavior[]): this {
    this.unitPlans.set(index, behaviors);
    return this;
  }

  /**
   * Fallback for units without an explicit plan
   */
  setPlanner(planner: SendPlanner): this {
    this.planner = planner;
    return this;
  }

  createSession = vi.fn(async (workerId: number): Promise<ITTSSession> => {
    let sessionSuccesses = 0;
    return {
      send: async (request: SendRequest) => {
        const index = indexFromRequestId(request.requestId);
        const call = (this.callsPerUnit.get(index) ?? 0) + 1;
        this.callsPerUnit.set(index, call);
        this.sent.push({ workerId, index, requestId: request.requestId, text: request.text });

        const plan = this.unitPlans.get(index);
        const behavior = plan ? (plan[call - 1] ?? 'ok') : this.planner({ workerId, index, call, sessionSuccesses });

        switch (behavior) {
          case 'ok':
            sessionSuccesses++;
            return audioFor(index);
          case 'transient':
            throw new RetriableError(`Network timeout on unit ${index}`);
          case 'hard-limit':
            sessionSuccesses = 0;
            throw new HardLimitError(`429 on unit ${index}`);
          case 'crash':
            throw new Error(`Session for worker ${workerId} crashed`);
          case 'hang':
            return waitForAbort(request.signal);
        }
      },
      close: async () => {
        this.closed.push(workerId);
      },
    };
  });

  callsFor(index: number): number {
    return this.callsPerUnit.get(index) ?? 0;
  }

  sentBy(workerId: number): number[] {
    return this.sent.filter((r) => r.workerId === workerId).map((r) => r.index);
  }
}

export function createMockSessionFactory(): MockSessionFactory {
  return new MockSessionFactory();
}
