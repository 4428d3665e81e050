/**
 * Tests de integración del motor de descargas.
 *
 * Prueba la coordinación entre componentes reales del motor:
 * - FetchWorker (undici) contra un MockAgent que hace de servidor de archivos
 * - Verifier calculando md5 de los .part en disco
 * - ProgressLedger (documento JSON real) para persistencia
 * - DownloadScheduler y RetryController para planificación y reintentos
 * - EventBus para comunicación de eventos
 *
 * NO hay red: todas las peticiones las responde el MockAgent.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { errors, MockAgent } from 'undici';
import DownloadScheduler from '../../src/engines/DownloadScheduler';
import { EventBus, type FileRetryingPayload } from '../../src/engines/EventBus';
import FetchWorker from '../../src/engines/FetchWorker';
import ProgressLedger from '../../src/engines/ProgressLedger';
import type { Job, TargetFile } from '../../src/engines/types';
import { RateLimiter } from '../../src/utils/rateLimiter';

const ORIGIN = 'https://ftp.example.org';
const GOOD = 'This contains data\n';
const GOOD_MD5 = 'e46c7039ed61c809401c378b1d4f604a';

describe('DownloadEngine Integration Flow', () => {
  let tmpDir: string;
  let agent: MockAgent;
  let ledger: ProgressLedger;
  let eventBus: EventBus;
  let retrying: FileRetryingPayload[];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-'));
    agent = new MockAgent();
    agent.disableNetConnect();
    ledger = new ProgressLedger(tmpDir);
    eventBus = new EventBus();
    retrying = [];
    eventBus.on('fileRetrying', (payload: FileRetryingPayload) => retrying.push(payload));
  });

  afterEach(async () => {
    await ledger.close();
    eventBus.clear();
    await agent.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function target(run: string): TargetFile {
    return {
      identifier: `${run}/${run}_1.fastq.gz`,
      remoteLocation: `${ORIGIN}/vol1/${run}/${run}_1.fastq.gz`,
      localPath: path.join(tmpDir, `${run}_1.fastq.gz`),
      expectedChecksum: GOOD_MD5,
      checksumAlgorithm: 'md5',
      sizeHint: GOOD.length,
    };
  }

  function serve(run: string, status: number, body: string, times = 1): void {
    agent
      .get(ORIGIN)
      .intercept({ path: `/vol1/${run}/${run}_1.fastq.gz`, method: 'GET' })
      .reply(status, body)
      .times(times);
  }

  function makeJob(files: TargetFile[]): Job {
    return {
      files,
      ledger,
      rateLimiter: new RateLimiter(10, 1000),
      concurrency: 2,
      retryPolicy: { maxRetries: 2, checksumRetries: 'shared' },
    };
  }

  function makeScheduler(): DownloadScheduler {
    return new DownloadScheduler({
      fetcher: new FetchWorker({ dispatcher: agent }),
      eventBus,
      backoff: () => 0,
    });
  }

  it('A correcto, B siempre sin cabeceras a tiempo y C corrupto una vez con max_retries = 2', async () => {
    serve('ERR000001', 200, GOOD);
    agent
      .get(ORIGIN)
      .intercept({ path: '/vol1/ERR000002/ERR000002_1.fastq.gz', method: 'GET' })
      .replyWithError(new errors.HeadersTimeoutError())
      .times(3);
    serve('ERR000003', 200, 'corrupted\n');
    serve('ERR000003', 200, GOOD);
    const files = ['ERR000001', 'ERR000002', 'ERR000003'].map(target);

    const report = await makeScheduler().run(makeJob(files));

    expect(report.verified).toEqual([
      'ERR000001/ERR000001_1.fastq.gz',
      'ERR000003/ERR000003_1.fastq.gz',
    ]);
    expect(report.failed).toEqual([
      {
        identifier: 'ERR000002/ERR000002_1.fastq.gz',
        attempts: 3,
        errorKind: 'transient',
        lastError: expect.any(String),
      },
    ]);
    expect(report.counts).toEqual({ verified: 2, skipped: 0, failedExhausted: 1, incomplete: 0 });
    expect(ledger.getEntry('ERR000003/ERR000003_1.fastq.gz')).toMatchObject({
      status: 'verified',
      attempts: 2,
    });
    expect(ledger.getEntry('ERR000002/ERR000002_1.fastq.gz')).toMatchObject({
      status: 'incomplete',
      attempts: 3,
    });
    expect(fs.readdirSync(tmpDir).sort()).toEqual([
      '.progress.json',
      'ERR000001_1.fastq.gz',
      'ERR000003_1.fastq.gz',
    ]);
    expect(fs.readFileSync(files[2].localPath, 'utf8')).toBe(GOOD);
    expect(
      retrying
        .filter(p => p.identifier === 'ERR000002/ERR000002_1.fastq.gz')
        .map(p => [p.attempt, p.errorKind])
    ).toEqual([
      [1, 'transient'],
      [2, 'transient'],
    ]);
    expect(
      retrying
        .filter(p => p.identifier === 'ERR000003/ERR000003_1.fastq.gz')
        .map(p => [p.attempt, p.errorKind])
    ).toEqual([[1, 'corruption']]);
    expect(agent.pendingInterceptors()).toEqual([]);
  });

  it('A, B (503 y después OK) y C (siempre corrupto) con max_retries = 2', async () => {
    serve('ERR000001', 200, GOOD);
    serve('ERR000002', 503, 'busy');
    serve('ERR000002', 200, GOOD);
    serve('ERR000003', 200, 'corrupted\n', 3);
    const files = ['ERR000001', 'ERR000002', 'ERR000003'].map(target);

    const report = await makeScheduler().run(makeJob(files));

    expect(report.verified).toEqual(['ERR000001/ERR000001_1.fastq.gz', 'ERR000002/ERR000002_1.fastq.gz']);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0]).toMatchObject({
      identifier: 'ERR000003/ERR000003_1.fastq.gz',
      attempts: 3,
      errorKind: 'corruption',
    });
    expect(report.bytesDownloaded).toBe(GOOD.length * 2);
    expect(fs.readFileSync(files[0].localPath, 'utf8')).toBe(GOOD);
    expect(fs.readFileSync(files[1].localPath, 'utf8')).toBe(GOOD);
    expect(fs.existsSync(files[2].localPath)).toBe(false);
    expect(fs.readdirSync(tmpDir).filter(name => name.endsWith('.part'))).toEqual([]);
    expect(retrying.map(p => [p.identifier, p.errorKind])).toEqual(
      expect.arrayContaining([
        ['ERR000002/ERR000002_1.fastq.gz', 'transient'],
        ['ERR000003/ERR000003_1.fastq.gz', 'corruption'],
      ])
    );
    expect(agent.pendingInterceptors()).toEqual([]);
  });

  it('la segunda ejecución solo vuelve a pedir el archivo que falló', async () => {
    serve('ERR000001', 200, GOOD);
    serve('ERR000002', 200, GOOD);
    serve('ERR000003', 404, 'not found');
    const files = ['ERR000001', 'ERR000002', 'ERR000003'].map(target);
    await makeScheduler().run(makeJob(files));
    await ledger.close();

    ledger = new ProgressLedger(tmpDir);
    serve('ERR000003', 200, GOOD);
    const report = await makeScheduler().run(makeJob(files));

    expect(report.skipped).toEqual(['ERR000001/ERR000001_1.fastq.gz', 'ERR000002/ERR000002_1.fastq.gz']);
    expect(report.verified).toEqual(['ERR000003/ERR000003_1.fastq.gz']);
    expect(agent.pendingInterceptors()).toEqual([]);
    expect(ledger.getSummary()).toEqual({ total: 3, verified: 3, incomplete: 0 });
  });

  it('debe recuperarse de una conexión cortada', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/vol1/ERR000004/ERR000004_1.fastq.gz', method: 'GET' })
      .replyWithError(Object.assign(new Error('other side closed'), { code: 'UND_ERR_SOCKET' }));
    serve('ERR000004', 200, GOOD);

    const report = await makeScheduler().run(makeJob([target('ERR000004')]));

    expect(report.verified).toEqual(['ERR000004/ERR000004_1.fastq.gz']);
    expect(retrying).toHaveLength(1);
    expect(retrying[0].errorKind).toBe('transient');
  });
});
