/**
 * Tests unitarios para src/utils/fileHelpers.ts
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  checkDiskSpace,
  formatBytes,
  getPartPath,
  pathExists,
  removeFileIfExists,
  sanitizeFilename,
  writeFileAtomic,
} from '../../src/utils/fileHelpers';

describe('fileHelpers', () => {
  describe('sanitizeFilename', () => {
    it('debe sustituir separadores y caracteres no válidos', () => {
      expect(sanitizeFilename('a/b\\c:d?.fastq.gz')).toBe('a_b_c_d_.fastq.gz');
    });

    it('debe proteger nombres reservados y vacíos', () => {
      expect(sanitizeFilename('CON')).toBe('_CON');
      expect(sanitizeFilename('')).toBe('unnamed');
      expect(sanitizeFilename('..')).toBe('unnamed');
    });

    it('debe truncar nombres demasiado largos', () => {
      expect(sanitizeFilename('x'.repeat(300))).toHaveLength(255);
    });
  });

  describe('getPartPath', () => {
    it('debe añadir el sufijo al destino', () => {
      expect(getPartPath('/data/a.fastq.gz')).toBe('/data/a.fastq.gz.part');
      expect(getPartPath('/data/a.fastq.gz', '.tmp')).toBe('/data/a.fastq.gz.tmp');
    });
  });

  describe('formatBytes', () => {
    it('debe formatear en la unidad adecuada', () => {
      expect(formatBytes(0)).toBe('0 Bytes');
      expect(formatBytes(19)).toBe('19 Bytes');
      expect(formatBytes(1536)).toBe('1.5 KB');
      expect(formatBytes(5 * 1024 * 1024)).toBe('5 MB');
    });
  });

  describe('operaciones en disco', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'files-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('removeFileIfExists debe tratar un archivo ausente como eliminado', async () => {
      const filePath = path.join(tmpDir, 'a.part');
      fs.writeFileSync(filePath, 'x');

      await expect(removeFileIfExists(filePath)).resolves.toBe(true);
      await expect(pathExists(filePath)).resolves.toBe(false);
      await expect(removeFileIfExists(filePath)).resolves.toBe(true);
    });

    it('writeFileAtomic debe crear directorios y no dejar temporales', async () => {
      const filePath = path.join(tmpDir, 'sub', 'report.json');

      await writeFileAtomic(filePath, '{"ok":true}');

      expect(fs.readFileSync(filePath, 'utf8')).toBe('{"ok":true}');
      expect(fs.readdirSync(path.dirname(filePath))).toEqual(['report.json']);
    });

    it('checkDiskSpace debe dar por suficiente un tamaño desconocido', async () => {
      await expect(checkDiskSpace(path.join(tmpDir, 'a'), undefined)).resolves.toEqual({
        sufficient: true,
        availableBytes: null,
        requiredBytes: 0,
      });
    });

    it('checkDiskSpace debe rechazar tamaños imposibles', async () => {
      const result = await checkDiskSpace(path.join(tmpDir, 'a'), Number.MAX_SAFE_INTEGER, 1);
      expect(result.sufficient).toBe(false);
      expect(result.requiredBytes).toBe(Number.MAX_SAFE_INTEGER);
    });
  });
});
