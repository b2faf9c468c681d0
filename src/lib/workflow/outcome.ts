import { classifyError, type FailureKind } from '../errors/workflow-errors.js';

export type Outcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: FailureKind; error: unknown };

export type OutcomeKind = Outcome<unknown>['kind'];

export function ok<T>(value: T): Outcome<T> {
  return { kind: 'ok', value };
}

export function failed<T>(error: unknown): Outcome<T> {
  return { kind: classifyError(error), error };
}

/** Run a step, turning a thrown error into its classified outcome */
export async function attempt<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    return failed(err);
  }
}
