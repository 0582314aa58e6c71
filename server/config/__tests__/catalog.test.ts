import { describe, expect, it } from 'vitest';
import { Catalog, loadCatalog, normalizeLabel } from '../catalog.js';

describe('Catalog', () => {
  const catalog = loadCatalog();

  it('loads the bundled tools, sources and languages', () => {
    expect(catalog.tools).toHaveLength(21);
    expect(catalog.sources.map((source) => source.key)).toEqual([
      'google_trends',
      'google_books',
      'bain_usability',
      'crossref',
      'bain_satisfaction',
    ]);
    expect(catalog.languages).toEqual(['es', 'en']);
  });

  it('resolves tools by key, localized name or id', () => {
    expect(catalog.resolveTool('calidad_total')?.key).toBe('calidad_total');
    expect(catalog.resolveTool('  Total   Quality Management ')?.key).toBe('calidad_total');
    expect(catalog.resolveTool('3')?.key).toBe('calidad_total');
    expect(catalog.resolveTool('six sigma-ish')).toBeUndefined();
  });

  it('resolves sources through their aliases', () => {
    expect(catalog.resolveSource('Bain - Usabilidad')?.key).toBe('bain_usability');
    expect(catalog.resolveSource('books')?.key).toBe('google_books');
    expect(catalog.sourceName('crossref.org')).toBe('Crossref');
  });

  it('names tools in the requested language', () => {
    expect(catalog.toolName('calidad_total', 'es')).toBe('Calidad Total');
    expect(catalog.toolName('calidad_total', 'en')).toBe('Total Quality Management');
    expect(catalog.toolName('unknown_tool', 'en')).toBe('unknown_tool');
  });

  it('rejects a label shared by two entries', () => {
    expect(
      () =>
        new Catalog({
          languages: ['es'],
          tools: [{ id: 1, key: 'a', nameEs: 'Uno', nameEn: 'One' }],
          sources: [
            { id: 1, key: 'x', displayName: 'Source X', aliases: ['shared'] },
            { id: 2, key: 'y', displayName: 'Source Y', aliases: ['Shared'] },
          ],
        }),
    ).toThrow('Catalog source label "Shared" is ambiguous between x and y');
  });
});

describe('normalizeLabel', () => {
  it('folds case and whitespace', () => {
    expect(normalizeLabel('  Google\tTrends ')).toBe('google trends');
  });
});
