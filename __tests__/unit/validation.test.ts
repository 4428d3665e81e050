/**
 * Tests unitarios para src/utils/validation.ts
 */
import { normalizeAccession, parseAccessions, validateAccession } from '../../src/utils/validation';

describe('validation', () => {
  describe('normalizeAccession', () => {
    it('debe recortar y pasar a mayúsculas', () => {
      expect(normalizeAccession('  err000001 \r')).toBe('ERR000001');
    });
  });

  describe('validateAccession', () => {
    it('debe aceptar runs de SRA, ENA y DDBJ', () => {
      expect(validateAccession('SRR000001', 'run')).toBe(true);
      expect(validateAccession('ERR000001', 'run')).toBe(true);
      expect(validateAccession('drr000001', 'run')).toBe(true);
    });

    it('debe aceptar muestras y estudios con sus prefijos', () => {
      expect(validateAccession('SAMEA0000001', 'sample')).toBe(true);
      expect(validateAccession('ERS000001', 'sample')).toBe(true);
      expect(validateAccession('PRJEB0001', 'study')).toBe(true);
      expect(validateAccession('ERP000001', 'study')).toBe(true);
    });

    it('debe rechazar prefijos de otro tipo', () => {
      expect(validateAccession('ERS000001', 'run')).toBe(false);
      expect(validateAccession('ERR000001', 'study')).toBe(false);
    });

    it('debe rechazar el prefijo solo o caracteres no alfanuméricos', () => {
      expect(validateAccession('ERR', 'run')).toBe(false);
      expect(validateAccession('ERR-0001', 'run')).toBe(false);
      expect(validateAccession('', 'run')).toBe(false);
    });
  });

  describe('parseAccessions', () => {
    it('debe separar válidas e inválidas ignorando vacías y comentarios', () => {
      const result = parseAccessions(
        ['ERR000001', '', '# comentario', ' err000002 ', 'ERS000001', 'ERR000001'],
        'run'
      );

      expect(result.valid).toEqual(['ERR000001', 'ERR000002']);
      expect(result.invalid).toEqual(['ERS000001']);
    });

    it('debe conservar el texto original de las inválidas', () => {
      expect(parseAccessions(['  no válida  '], 'sample').invalid).toEqual(['no válida']);
    });
  });
});
