/**
 * ENGINE — DASE Contracts
 *
 * An engine is four stages run in a fixed order:
 *   DataSource → Preparator → Algorithm(s) → Serving
 * plus the evaluation folds a DataSource may offer.
 *
 * Type parameters, used throughout the module:
 *   TD training data · EI evaluation info · PD prepared data
 *   Q query · P predicted result · A actual result
 */

import type { Logger } from '../../common/logger.js';
import type { EventStore } from '../events/events.store.js';

export type MaybePromise<T> = T | Promise<T>;

export interface EngineContext {
  eventStore: EventStore;
  logger: Logger;
}

export interface EvalFold<TD, EI, Q, A> {
  trainingData: TD;
  evalInfo: EI;
  qa: Array<[Q, A]>;
}

export interface DataSource<TD, EI, Q, A> {
  readTraining(): Promise<TD>;
  readEval?(): Promise<Array<EvalFold<TD, EI, Q, A>>>;
}

export interface Preparator<TD, PD> {
  prepare(trainingData: TD): MaybePromise<PD>;
}

export interface Algorithm<PD, M, Q, P> {
  train(preparedData: PD): MaybePromise<M>;
  predict(model: M, query: Q): MaybePromise<P>;
  /** Rebuilds a model from its persisted JSON form */
  loadModel(raw: unknown): M;
}

export interface Serving<Q, P> {
  supplement?(query: Q): MaybePromise<Q>;
  serve(query: Q, predictions: P[]): MaybePromise<P>;
}

/** Implemented by training data that can check itself before training */
export interface SanityCheck {
  sanityCheck(): void;
}

export function hasSanityCheck(value: unknown): value is SanityCheck {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sanityCheck' in value &&
    typeof value.sanityCheck === 'function'
  );
}

export type StageFactory<T> = (params: Record<string, unknown>, ctx: EngineContext) => T;

export interface Engine<TD, EI, PD, Q, P, A> {
  /** Name recorded on engine instances */
  factory: string;
  dataSource: StageFactory<DataSource<TD, EI, Q, A>>;
  preparator: StageFactory<Preparator<TD, PD>>;
  algorithms: Record<string, StageFactory<Algorithm<PD, unknown, Q, P>>>;
  serving: StageFactory<Serving<Q, P>>;
  /** Validates an incoming query body */
  parseQuery(body: unknown): Q;
}
