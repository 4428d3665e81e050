/**
 * Tests unitarios para src/engines/DownloadStateMachine.ts
 */
import {
  canTransition,
  DownloadStateMachine,
  isTerminalState,
  STATE,
} from '../../src/engines/DownloadStateMachine';

describe('DownloadStateMachine', () => {
  describe('canTransition', () => {
    it('acepta transiciones válidas', () => {
      expect(canTransition(STATE.PENDING, STATE.ATTEMPTING)).toBe(true);
      expect(canTransition(STATE.ATTEMPTING, STATE.VERIFYING)).toBe(true);
      expect(canTransition(STATE.ATTEMPTING, STATE.RETRYING)).toBe(true);
      expect(canTransition(STATE.ATTEMPTING, STATE.EXHAUSTED)).toBe(true);
      expect(canTransition(STATE.VERIFYING, STATE.VERIFIED)).toBe(true);
      expect(canTransition(STATE.VERIFYING, STATE.RETRYING)).toBe(true);
      expect(canTransition(STATE.VERIFYING, STATE.EXHAUSTED)).toBe(true);
      expect(canTransition(STATE.RETRYING, STATE.ATTEMPTING)).toBe(true);
    });

    it('rechaza transiciones inválidas', () => {
      expect(canTransition(STATE.PENDING, STATE.VERIFIED)).toBe(false);
      expect(canTransition(STATE.ATTEMPTING, STATE.VERIFIED)).toBe(false);
      expect(canTransition(STATE.RETRYING, STATE.VERIFYING)).toBe(false);
      expect(canTransition(STATE.VERIFIED, STATE.ATTEMPTING)).toBe(false);
      expect(canTransition(STATE.EXHAUSTED, STATE.RETRYING)).toBe(false);
    });
  });

  describe('isTerminalState', () => {
    it('solo verified y exhausted son terminales', () => {
      expect(isTerminalState(STATE.VERIFIED)).toBe(true);
      expect(isTerminalState(STATE.EXHAUSTED)).toBe(true);
      expect(isTerminalState(STATE.PENDING)).toBe(false);
      expect(isTerminalState(STATE.RETRYING)).toBe(false);
    });
  });

  describe('instancia', () => {
    it('debe empezar en pending', () => {
      const fsm = new DownloadStateMachine('ERR000001/a.fastq.gz');
      expect(fsm.state).toBe(STATE.PENDING);
      expect(fsm.isTerminal()).toBe(false);
    });

    it('debe registrar el historial de un reintento hasta verified', () => {
      const fsm = new DownloadStateMachine('ERR000001/a.fastq.gz');
      fsm.transition(STATE.ATTEMPTING);
      fsm.transition(STATE.VERIFYING);
      fsm.transition(STATE.RETRYING);
      fsm.transition(STATE.ATTEMPTING);
      fsm.transition(STATE.VERIFYING);
      fsm.transition(STATE.VERIFIED);

      expect(fsm.isTerminal()).toBe(true);
      expect(fsm.history).toEqual([
        'pending',
        'attempting',
        'verifying',
        'retrying',
        'attempting',
        'verifying',
        'verified',
      ]);
    });

    it('debe lanzar ante una transición inválida sin cambiar de estado', () => {
      const fsm = new DownloadStateMachine('ERR000001/a.fastq.gz');
      expect(() => fsm.transition(STATE.VERIFIED)).toThrow(
        'Transición de estado inválida para ERR000001/a.fastq.gz: pending -> verified'
      );
      expect(fsm.state).toBe(STATE.PENDING);
    });
  });
});
