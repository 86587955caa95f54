/**
 * Tagged outcome of one processing stage. Unlike `Result`, a stage can also decline to
 * run (`skipped`) without that being a failure.
 */

export interface StageOk<T> {
  readonly kind: 'ok';
  readonly value: T;
}

export interface StageSkipped {
  readonly kind: 'skipped';
  readonly reason: string;
}

export interface StageFailed<E> {
  readonly kind: 'failed';
  readonly reason: string;
  readonly error: E;
}

export type StageOutcome<T, E> = StageOk<T> | StageSkipped | StageFailed<E>;

export function stageOk<T>(value: T): StageOk<T> {
  return { kind: 'ok', value };
}

export function stageSkipped(reason: string): StageSkipped {
  return { kind: 'skipped', reason };
}

export function stageFailed<E>(reason: string, error: E): StageFailed<E> {
  return { kind: 'failed', reason, error };
}
