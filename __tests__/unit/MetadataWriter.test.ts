/**
 * Tests unitarios para src/ena/MetadataWriter.ts
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { formatMetadataTsv, writeMetadataFile } from '../../src/ena/MetadataWriter';

describe('MetadataWriter', () => {
  describe('formatMetadataTsv', () => {
    it('debe escribir cabecera y una línea por fila en el orden de columnas', () => {
      const tsv = formatMetadataTsv(
        [
          { run_accession: 'ERR000001', sample_title: 'muestra 1' },
          { run_accession: 'ERR000002' },
        ],
        ['run_accession', 'sample_title']
      );

      expect(tsv).toBe('run_accession\tsample_title\nERR000001\tmuestra 1\nERR000002\t\n');
    });

    it('debe sustituir tabuladores y saltos de línea dentro de los valores', () => {
      const tsv = formatMetadataTsv([{ title: 'a\tb\r\nc' }], ['title']);
      expect(tsv).toBe('title\na b c\n');
    });
  });

  describe('writeMetadataFile', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'metadata-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('debe escribir metadata.tsv con las columnas de la primera fila', async () => {
      const written = await writeMetadataFile(tmpDir, [
        { run_accession: 'ERR000001', study_accession: 'PRJEB0001' },
      ]);

      expect(written).toBe(path.join(tmpDir, 'metadata.tsv'));
      expect(fs.readFileSync(path.join(tmpDir, 'metadata.tsv'), 'utf8')).toBe(
        'run_accession\tstudy_accession\nERR000001\tPRJEB0001\n'
      );
    });

    it('debe sobrescribir un archivo existente sin dejar temporales', async () => {
      fs.writeFileSync(path.join(tmpDir, 'metadata.tsv'), 'antiguo');

      await writeMetadataFile(tmpDir, [{ run_accession: 'ERR000002' }], ['run_accession']);

      expect(fs.readdirSync(tmpDir)).toEqual(['metadata.tsv']);
      expect(fs.readFileSync(path.join(tmpDir, 'metadata.tsv'), 'utf8')).toBe(
        'run_accession\nERR000002\n'
      );
    });

    it('debe devolver null sin filas', async () => {
      await expect(writeMetadataFile(tmpDir, [])).resolves.toBeNull();
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });
  });
});
