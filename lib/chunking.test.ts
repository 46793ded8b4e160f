import { describe, expect, it } from 'vitest';
import { chunkDocument, computeChunkHash, getSeparators, splitText } from './chunking';

describe('computeChunkHash', () => {
  it('returns the first 12 hex chars of the md5 digest', () => {
    expect(computeChunkHash('abc')).toBe('900150983cd2');
  });

  it('is deterministic', () => {
    expect(computeChunkHash('Artículo 131')).toBe(computeChunkHash('Artículo 131'));
    expect(computeChunkHash('Artículo 131')).not.toBe(computeChunkHash('Artículo 132'));
  });
});

describe('getSeparators', () => {
  it('splits legal texts by article markers first', () => {
    expect(getSeparators('ley').slice(0, 2)).toEqual(['\nARTÍCULO', '\nArtículo']);
    expect(getSeparators('decreto')).toBe(getSeparators('ley'));
  });

  it('uses ruling markers for court decisions', () => {
    expect(getSeparators('jurisprudencia')[0]).toBe('\nSentencia');
  });

  it('falls back to paragraphs and sentences', () => {
    expect(getSeparators('compendio')).toEqual(['\n\n', '\n', '. ', ' ']);
    expect(getSeparators('unknown')).toEqual(['\n\n', '\n', '. ', ' ']);
  });
});

describe('splitText', () => {
  it('keeps a short text as one trimmed chunk', () => {
    expect(splitText('  Hola mundo  ')).toEqual(['Hola mundo']);
  });

  it('returns no chunks for blank text', () => {
    expect(splitText('   \n\n  ')).toEqual([]);
  });

  it('carries the tail of the previous chunk as overlap', () => {
    const chunks = splitText('uno dos tres cuatro cinco seis', undefined, {
      chunkSize: 12,
      overlap: 5,
    });

    expect(chunks).toEqual(['uno dos tres', 'tres cuatro', 'cinco seis']);
  });

  it('emits an unsplittable word longer than the chunk size whole', () => {
    const longWord = 'x'.repeat(30);

    const chunks = splitText(`corto ${longWord} fin`, [' '], { chunkSize: 10, overlap: 0 });

    expect(chunks).toEqual(['corto', longWord, 'fin']);
  });

  it('keeps a text without any separator as one oversized chunk', () => {
    const chunks = splitText('y'.repeat(25), ['\n\n', ' '], { chunkSize: 10, overlap: 2 });

    expect(chunks).toEqual(['y'.repeat(25)]);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => splitText('abc', undefined, { chunkSize: 10, overlap: 10 })).toThrow(
      'Перекрытие (10) должно быть меньше размера чанка (10)'
    );
  });
});

describe('chunkDocument', () => {
  it('splits a law at article boundaries', () => {
    const text =
      'ARTÍCULO 1. Primero texto corto.\nARTÍCULO 2. Segundo texto corto.\nARTÍCULO 3. Tercero.';

    const chunks = chunkDocument(text, 'ley', { chunkSize: 60, overlap: 0 });

    expect(chunks.map(chunk => chunk.text)).toEqual([
      'ARTÍCULO 1. Primero texto corto.',
      'ARTÍCULO 2. Segundo texto corto.\nARTÍCULO 3. Tercero.',
    ]);
    expect(chunks.map(chunk => chunk.index)).toEqual([0, 1]);
    expect(chunks[0].hash).toBe(computeChunkHash('ARTÍCULO 1. Primero texto corto.'));
  });

  it('never produces chunks longer than the chunk size when separators exist', () => {
    const text = Array.from({ length: 40 }, (_, i) => `Frase número ${i} del texto.`).join(' ');

    const chunks = chunkDocument(text, 'guia', { chunkSize: 100, overlap: 20 });

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.text.length).toBeLessThanOrEqual(100);
    }
  });

  it('does not truncate or drop an oversized document', () => {
    const text = 'a'.repeat(1500);

    const chunks = chunkDocument(text, 'unknown');

    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe(text);
  });
});
