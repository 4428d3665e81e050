/**
 * @fileoverview Rate Limiter - token bucket compartido para peticiones al archivo
 * @module rateLimiter
 *
 * Cada intento de descarga consume un token. Los tokens se reponen de forma continua a
 * refillPerSecond hasta capacity. Los que esperan se atienden estrictamente en orden FIFO;
 * un waiter cuyo AbortSignal se dispara sale de la cola y su promesa se rechaza con el motivo.
 */

import { logger } from './logger';

const log = logger.child('RateLimiter');

export interface RateLimiterStats {
  capacity: number;
  refillPerSecond: number;
  availableTokens: number;
  waiting: number;
  granted: number;
}

interface Waiter {
  resolve: () => void;
  reject: (_reason: unknown) => void;
  detach: () => void;
}

export class RateLimiter {
  readonly capacity: number;
  readonly refillPerSecond: number;
  private tokens: number;
  private lastRefill: number;
  private waiters: Waiter[] = [];
  private timer: NodeJS.Timeout | null = null;
  private granted = 0;

  constructor(capacity: number, refillPerSecond: number) {
    // con capacity < 1 nunca se acumula un token entero y acquire() no resolvería
    if (!(capacity >= 1)) {
      throw new Error('capacity debe ser al menos 1');
    }
    if (!(refillPerSecond > 0)) {
      throw new Error('refillPerSecond debe ser mayor a 0');
    }

    this.capacity = capacity;
    this.refillPerSecond = refillPerSecond;
    this.tokens = capacity;
    this.lastRefill = Date.now();

    log.debug(`RateLimiter inicializado: ráfaga ${capacity}, ${refillPerSecond} req/s`);
  }

  /** Toma un token sin esperar. Nunca se adelanta a quien ya está en cola. */
  tryAcquire(): boolean {
    if (this.waiters.length > 0) return false;
    this._refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      this.granted++;
      return true;
    }
    return false;
  }

  /** Resuelve cuando hay un token disponible para quien llama. */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.tryAcquire()) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter(w => w !== waiter);
        if (this.waiters.length === 0) this._clearTimer();
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
      this._schedule();
    });
  }

  /** Rechaza a todos los que esperan (cierre del trabajo). */
  rejectAll(reason: unknown): number {
    const pending = this.waiters;
    this.waiters = [];
    this._clearTimer();
    for (const waiter of pending) {
      waiter.detach();
      waiter.reject(reason);
    }
    return pending.length;
  }

  getStats(): RateLimiterStats {
    this._refill();
    return {
      capacity: this.capacity,
      refillPerSecond: this.refillPerSecond,
      availableTokens: Math.floor(this.tokens),
      waiting: this.waiters.length,
      granted: this.granted,
    };
  }

  private _refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + (elapsed / 1000) * this.refillPerSecond);
      this.lastRefill = now;
    }
  }

  private _drain(): void {
    this.timer = null;
    this._refill();
    while (this.tokens >= 1) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      this.tokens -= 1;
      this.granted++;
      waiter.detach();
      waiter.resolve();
    }
    this._schedule();
  }

  private _schedule(): void {
    if (this.timer || this.waiters.length === 0) return;
    const missing = Math.max(0, 1 - this.tokens);
    const waitMs = Math.ceil((missing / this.refillPerSecond) * 1000);
    this.timer = setTimeout(() => this._drain(), waitMs);
  }

  private _clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
