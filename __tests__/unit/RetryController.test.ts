/**
 * Tests unitarios para src/engines/RetryController.ts
 *
 * El fetcher escribe .part reales en un directorio temporal y el Verifier calcula su md5;
 * el ledger es en memoria.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ErrorKind } from '../../src/engines/errors';
import { EventBus, type FileRetryingPayload } from '../../src/engines/EventBus';
import { RetryController, type SleepFn } from '../../src/engines/RetryController';
import type { RetryPolicy, TargetFile } from '../../src/engines/types';
import Verifier from '../../src/engines/Verifier';
import { RateLimiter } from '../../src/utils/rateLimiter';
import {
  GOOD_CONTENT,
  GOOD_MD5,
  makeTarget,
  MemoryLedger,
  noopSleep,
  ScriptedFetcher,
  type FetchStep,
} from '../helpers/fakes';

describe('RetryController', () => {
  let tmpDir: string;
  let ledger: MemoryLedger;
  let rateLimiter: RateLimiter;
  let eventBus: EventBus;
  let sleeps: number[];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'retry-'));
    ledger = new MemoryLedger();
    rateLimiter = new RateLimiter(100, 100);
    eventBus = new EventBus();
    sleeps = [];
  });

  afterEach(() => {
    eventBus.clear();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const recordingSleep: SleepFn = async ms => {
    sleeps.push(ms);
  };

  function setup(
    steps: FetchStep[],
    policy: RetryPolicy = { maxRetries: 2, checksumRetries: 'shared' },
    sleep: SleepFn = recordingSleep
  ): { controller: RetryController; fetcher: ScriptedFetcher; file: TargetFile } {
    const file = makeTarget(tmpDir, 'ERR000001/a.fastq.gz');
    const fetcher = new ScriptedFetcher({ [file.identifier]: steps });
    const controller = new RetryController(
      {
        fetcher,
        verifier: new Verifier(),
        ledger,
        rateLimiter,
        eventBus,
        backoff: retryCount => (retryCount + 1) * 10,
        sleep,
      },
      policy
    );
    return { controller, fetcher, file };
  }

  it('debe verificar a la primera y mover el .part al destino', async () => {
    const { controller, file } = setup(['good']);

    const outcome = await controller.run(file, new AbortController().signal);

    expect(outcome).toEqual({
      identifier: file.identifier,
      status: 'verified',
      attempts: 1,
      bytesWritten: GOOD_CONTENT.length,
      errorKind: null,
      lastError: null,
    });
    expect(fs.readFileSync(file.localPath, 'utf8')).toBe(GOOD_CONTENT);
    expect(fs.existsSync(`${file.localPath}.part`)).toBe(false);
    expect(ledger.writes).toEqual([
      {
        identifier: file.identifier,
        status: 'verified',
        checksum: GOOD_MD5,
        details: { localPath: file.localPath, attempts: 1, lastError: null },
      },
    ]);
  });

  it('debe reintentar fallos transitorios con backoff creciente', async () => {
    const { controller, file } = setup(['transient', 'transient', 'good']);
    const retrying: FileRetryingPayload[] = [];
    eventBus.on('fileRetrying', (payload: FileRetryingPayload) => retrying.push(payload));

    const outcome = await controller.run(file, new AbortController().signal);

    expect(outcome?.status).toBe('verified');
    expect(outcome?.attempts).toBe(3);
    expect(sleeps).toEqual([10, 20]);
    expect(retrying.map(p => [p.attempt, p.errorKind, p.delayMs])).toEqual([
      [1, 'transient', 10],
      [2, 'transient', 20],
    ]);
    expect(rateLimiter.getStats().granted).toBe(3);
  });

  it('debe agotar tras exactamente maxRetries + 1 intentos', async () => {
    const { controller, fetcher, file } = setup(['transient']);

    const outcome = await controller.run(file, new AbortController().signal);

    expect(outcome).toEqual({
      identifier: file.identifier,
      status: 'failed_exhausted',
      attempts: 3,
      bytesWritten: 0,
      errorKind: ErrorKind.TRANSIENT,
      lastError: 'Error del servidor (HTTP 503)',
    });
    expect(fetcher.attemptsFor(file.identifier)).toBe(3);
    expect(ledger.writes).toHaveLength(1);
    expect(ledger.writes[0]).toMatchObject({
      status: 'incomplete',
      details: { localPath: null, attempts: 3, lastError: 'Error del servidor (HTTP 503)' },
    });
  });

  it('con maxRetries 0 debe hacer un único intento', async () => {
    const { controller, fetcher, file } = setup(['transient'], {
      maxRetries: 0,
      checksumRetries: 'shared',
    });

    const outcome = await controller.run(file, new AbortController().signal);

    expect(outcome?.status).toBe('failed_exhausted');
    expect(fetcher.attemptsFor(file.identifier)).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('no debe dejar nunca un archivo con checksum incorrecto en el destino', async () => {
    const { controller, file } = setup(['corrupt']);

    const outcome = await controller.run(file, new AbortController().signal);

    expect(outcome?.status).toBe('failed_exhausted');
    expect(outcome?.attempts).toBe(3);
    expect(outcome?.errorKind).toBe(ErrorKind.CORRUPTION);
    expect(outcome?.lastError).toContain('El checksum no coincide con el esperado');
    expect(fs.existsSync(file.localPath)).toBe(false);
    expect(fs.existsSync(`${file.localPath}.part`)).toBe(false);
  });

  it('debe recuperarse de un checksum incorrecto si queda presupuesto', async () => {
    const { controller, file } = setup(['corrupt', 'good']);

    const outcome = await controller.run(file, new AbortController().signal);

    expect(outcome?.status).toBe('verified');
    expect(outcome?.attempts).toBe(2);
    expect(fs.readFileSync(file.localPath, 'utf8')).toBe(GOOD_CONTENT);
  });

  it('no debe reintentar un fallo permanente', async () => {
    const { controller, fetcher, file } = setup(['permanent']);

    const outcome = await controller.run(file, new AbortController().signal);

    expect(outcome?.status).toBe('failed_exhausted');
    expect(outcome?.errorKind).toBe(ErrorKind.PERMANENT);
    expect(outcome?.attempts).toBe(1);
    expect(fetcher.attemptsFor(file.identifier)).toBe(1);
    expect(sleeps).toEqual([]);
  });

  describe('checksumRetries independiente', () => {
    it('debe dar a los fallos de checksum su propio presupuesto', async () => {
      const { controller, file } = setup(['corrupt', 'corrupt', 'good'], {
        maxRetries: 0,
        checksumRetries: 2,
      });

      const outcome = await controller.run(file, new AbortController().signal);

      expect(outcome?.status).toBe('verified');
      expect(outcome?.attempts).toBe(3);
    });

    it('no debe ampliar el presupuesto de los fallos de transporte', async () => {
      const { controller, file } = setup(['transient'], { maxRetries: 0, checksumRetries: 2 });

      const outcome = await controller.run(file, new AbortController().signal);

      expect(outcome?.status).toBe('failed_exhausted');
      expect(outcome?.attempts).toBe(1);
    });

    it('debe agotar al superar checksumRetries', async () => {
      const { controller, file } = setup(['corrupt'], { maxRetries: 5, checksumRetries: 1 });

      const outcome = await controller.run(file, new AbortController().signal);

      expect(outcome?.errorKind).toBe(ErrorKind.CORRUPTION);
      expect(outcome?.attempts).toBe(2);
    });
  });

  it('debe agotar con error permanente si no puede mover el archivo verificado', async () => {
    const { controller, file } = setup(['good']);
    fs.mkdirSync(file.localPath, { recursive: true });
    fs.writeFileSync(path.join(file.localPath, 'ocupado'), 'x');

    const outcome = await controller.run(file, new AbortController().signal);

    expect(outcome?.status).toBe('failed_exhausted');
    expect(outcome?.errorKind).toBe(ErrorKind.PERMANENT);
    expect(outcome?.lastError).toContain('Error moviendo el archivo verificado a su destino');
    expect(fs.existsSync(`${file.localPath}.part`)).toBe(false);
  });

  describe('cancelación', () => {
    it('debe devolver null sin intentar si la señal ya está abortada', async () => {
      const { controller, fetcher, file } = setup(['good']);
      const abort = new AbortController();
      abort.abort();

      await expect(controller.run(file, abort.signal)).resolves.toBeNull();
      expect(fetcher.calls).toEqual([]);
      expect(ledger.writes).toEqual([]);
    });

    it('debe devolver null si se cancela durante el backoff', async () => {
      const abort = new AbortController();
      const abortingSleep: SleepFn = async (_ms, signal) => {
        abort.abort(new Error('cancelado'));
        throw signal.reason;
      };
      const { controller, fetcher, file } = setup(
        ['transient', 'good'],
        { maxRetries: 2, checksumRetries: 'shared' },
        abortingSleep
      );

      await expect(controller.run(file, abort.signal)).resolves.toBeNull();
      expect(fetcher.attemptsFor(file.identifier)).toBe(1);
      expect(ledger.writes).toEqual([]);
    });

    it('debe devolver null si se cancela con la transferencia en curso', async () => {
      const abort = new AbortController();
      const file = makeTarget(tmpDir, 'ERR000002/b.fastq.gz');
      const fetcher = new ScriptedFetcher({ [file.identifier]: ['hang'] }, () =>
        abort.abort(new Error('cancelado'))
      );
      const controller = new RetryController(
        { fetcher, verifier: new Verifier(), ledger, rateLimiter, eventBus, sleep: noopSleep },
        { maxRetries: 2, checksumRetries: 'shared' }
      );

      await expect(controller.run(file, abort.signal)).resolves.toBeNull();
      expect(ledger.writes).toEqual([]);
    });
  });

  it('maxAttempts debe ser maxRetries + 1', () => {
    const { controller } = setup(['good'], { maxRetries: 4, checksumRetries: 'shared' });
    expect(controller.maxAttempts).toBe(5);
  });
});
