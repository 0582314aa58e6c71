import { describe, expect, it } from 'vitest';
import { InvalidCombinationError } from '../../errors.js';
import { catalog } from '../../__tests__/fixtures.js';
import { analysisTypeFor, canonicalize, hashCanonical, serializeCombination } from '../combination-key.js';

describe('canonicalize', () => {
  it('hashes display names and lower-cased aliases identically', () => {
    const a = canonicalize('Benchmarking', ['Google Trends'], 'es', catalog);
    const b = canonicalize('Benchmarking', ['google trends'], 'es', catalog);

    expect(a.hash).toBe(b.hash);
    expect(a.canonical).toBe('{"tool":"benchmarking","sources":["google_trends"],"language":"es"}');
    expect(a.hash).toHaveLength(64);
  });

  it('is independent of source order, duplicates and surrounding whitespace', () => {
    const a = canonicalize('benchmarking', ['crossref', 'Google Books', 'bain_usability'], 'en', catalog);
    const b = canonicalize('  BENCHMARKING ', ['bain - usabilidad', 'crossref.org', 'books', 'Crossref'], ' EN ', catalog);

    expect(b.hash).toBe(a.hash);
    expect(a.sourceKeys).toEqual(['bain_usability', 'crossref', 'google_books']);
  });

  it('resolves tools by Spanish and English names', () => {
    const es = canonicalize('Gestión de Costos', ['trends'], 'es', catalog);
    const en = canonicalize('cost management', ['trends'], 'es', catalog);

    expect(es.toolKey).toBe('gestion_de_costos');
    expect(en.hash).toBe(es.hash);
  });

  it('distinguishes languages', () => {
    const es = canonicalize('benchmarking', ['crossref'], 'es', catalog);
    const en = canonicalize('benchmarking', ['crossref'], 'en', catalog);
    expect(es.hash).not.toBe(en.hash);
  });

  it('derives the analysis type from the source count', () => {
    expect(canonicalize('benchmarking', ['crossref'], 'es', catalog).analysisType).toBe('single');
    expect(canonicalize('benchmarking', ['crossref', 'crossref.org'], 'es', catalog).analysisType).toBe('single');
    expect(canonicalize('benchmarking', ['crossref', 'trends'], 'es', catalog).analysisType).toBe('multi');
    expect(analysisTypeFor(5)).toBe('multi');
  });

  it('returns a frozen key whose hash is the digest of its canonical form', () => {
    const key = canonicalize('benchmarking', ['trends', 'books'], 'es', catalog);

    expect(Object.isFrozen(key)).toBe(true);
    expect(Object.isFrozen(key.sourceKeys)).toBe(true);
    expect(key.canonical).toBe(serializeCombination('benchmarking', ['google_books', 'google_trends'], 'es'));
    expect(key.hash).toBe(hashCanonical(key.canonical));
  });

  it('rejects an empty source set', () => {
    expect(() => canonicalize('benchmarking', [], 'es', catalog)).toThrow(InvalidCombinationError);
    expect(() => canonicalize('benchmarking', ['', '  '], 'es', catalog)).toThrow(
      'At least one data source is required',
    );
  });

  it('rejects unknown tools, sources and languages', () => {
    expect(() => canonicalize('six sigma', ['trends'], 'es', catalog)).toThrow('Unknown tool "six sigma"');
    expect(() => canonicalize('benchmarking', ['trends', 'twitter'], 'es', catalog)).toThrow(
      'Unknown source(s): twitter',
    );
    expect(() => canonicalize('benchmarking', ['trends'], 'fr', catalog)).toThrow('Unsupported language "fr"');
  });
});
