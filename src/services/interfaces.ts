// Service Interfaces
// Seams to the collaborators the coordinator does not implement itself

import type { CheckpointRequest, WorkUnit } from '@/state/types';

export type { ILogger } from './Logger';

export interface SendRequest {
  text: string;
  voice: string;
  requestId: string;
  signal?: AbortSignal;
}

/**
 * One isolated session with the remote TTS service (own cookies/profile).
 *
 * `send` resolves with audio bytes, or rejects with RetriableError for
 * network/timeout trouble or HardLimitError when the session quota is spent.
 */
export interface ITTSSession {
  send(request: SendRequest): Promise<Uint8Array>;
  close?(): Promise<void>;
}

export interface ITTSSessionFactory {
  createSession(workerId: number, signal: AbortSignal): Promise<ITTSSession>;
}

/**
 * Where produced audio goes, addressed by the unit's outputKey
 */
export interface IAudioSink {
  write(unit: WorkUnit, audio: Uint8Array): Promise<void>;
  exists(unit: WorkUnit): Promise<boolean>;
}

/**
 * Operator surface for verification pauses. Resolves when the operator
 * confirms; rejects when the signal aborts.
 */
export interface ICheckpointHandler {
  awaitCheckpoint(request: CheckpointRequest, signal: AbortSignal): Promise<void>;
}

/**
 * The part of the manifest a worker writes to
 */
export interface IManifestWriter {
  markCompleted(index: number): Promise<void>;
  markFailed(index: number): Promise<void>;
}
