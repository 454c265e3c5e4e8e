import { ErrorHandler, type OperationContext } from '../../utils/errors/errorHandler.js';

export interface Transition<S, O> {
  state: S;
  outcome: O;
}

/**
 * Applies `mutate` to a structured clone of `state`. A throw discards the
 * clone, so the caller's value is never partially updated.
 */
export function applyTransition<S, O>(state: S, context: OperationContext, mutate: (draft: S) => O): Transition<S, O> {
  return ErrorHandler.monitor(context, () => {
    const draft = structuredClone(state);
    const outcome = mutate(draft);
    return { state: draft, outcome };
  });
}
