/**
 * Máquina de estados explícita del ciclo de reintentos de un archivo.
 *
 * Cada TargetFile recorre pending → attempting → verifying → verified, con desvíos a
 * retrying (fallo transitorio o checksum incorrecto con presupuesto restante) y a
 * exhausted (fallo permanente o presupuesto agotado). Cualquier transición no listada
 * es inválida y el RetryController la rechaza.
 *
 * @module DownloadStateMachine
 */

import { DOWNLOAD_ERRORS } from '../constants/errors';

export const STATE = {
  PENDING: 'pending',
  ATTEMPTING: 'attempting',
  VERIFYING: 'verifying',
  VERIFIED: 'verified',
  RETRYING: 'retrying',
  EXHAUSTED: 'exhausted',
} as const;

export type StateKey = keyof typeof STATE;
export type StateValue = (typeof STATE)[StateKey];

/**
 * Transiciones permitidas: desde cada estado, lista de estados destino válidos.
 */
const TRANSITIONS: Record<StateValue, readonly StateValue[]> = {
  [STATE.PENDING]: [STATE.ATTEMPTING],
  [STATE.ATTEMPTING]: [STATE.VERIFYING, STATE.RETRYING, STATE.EXHAUSTED],
  [STATE.VERIFYING]: [STATE.VERIFIED, STATE.RETRYING, STATE.EXHAUSTED],
  [STATE.RETRYING]: [STATE.ATTEMPTING],
  [STATE.VERIFIED]: [],
  [STATE.EXHAUSTED]: [],
};

export function canTransition(fromState: StateValue, toState: StateValue): boolean {
  return TRANSITIONS[fromState].includes(toState);
}

export const TERMINAL_STATES: readonly StateValue[] = [STATE.VERIFIED, STATE.EXHAUSTED];

export function isTerminalState(state: StateValue): boolean {
  return TERMINAL_STATES.includes(state);
}

/**
 * Instancia por archivo: guarda el estado actual y el historial de transiciones.
 */
export class DownloadStateMachine {
  private _state: StateValue = STATE.PENDING;
  private readonly _history: StateValue[] = [STATE.PENDING];

  constructor(readonly identifier: string) {}

  get state(): StateValue {
    return this._state;
  }

  get history(): readonly StateValue[] {
    return this._history;
  }

  /** Aplica la transición o lanza si no está permitida desde el estado actual. */
  transition(toState: StateValue): void {
    if (!canTransition(this._state, toState)) {
      throw new Error(
        `${DOWNLOAD_ERRORS.INVALID_TRANSITION} para ${this.identifier}: ${this._state} -> ${toState}`
      );
    }
    this._state = toState;
    this._history.push(toState);
  }

  isTerminal(): boolean {
    return isTerminalState(this._state);
  }
}
