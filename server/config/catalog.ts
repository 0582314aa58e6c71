import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Research tools, data sources and languages that make up the combination space.

const toolSchema = z.object({
  id: z.number().int().positive(),
  key: z.string().regex(/^[a-z0-9_]+$/),
  nameEs: z.string().min(1),
  nameEn: z.string().min(1),
});

const sourceSchema = z.object({
  id: z.number().int().positive(),
  key: z.string().regex(/^[a-z0-9_]+$/),
  displayName: z.string().min(1),
  aliases: z.array(z.string()).default([]),
});

export const catalogSchema = z.object({
  languages: z.array(z.enum(['es', 'en'])).min(1),
  tools: z.array(toolSchema).min(1),
  sources: z.array(sourceSchema).min(1),
});

export type Language = 'es' | 'en';
export type ToolEntry = z.infer<typeof toolSchema>;
export type SourceEntry = z.infer<typeof sourceSchema>;
export type CatalogData = z.input<typeof catalogSchema>;

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../data/catalog.json', import.meta.url));

/**
 * Lower-case and collapse whitespace so "Google  Trends" and "google trends"
 * resolve to the same entry.
 */
export function normalizeLabel(value: string): string {
  return value.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export class Catalog {
  readonly tools: readonly ToolEntry[];
  readonly sources: readonly SourceEntry[];
  readonly languages: readonly Language[];

  private toolIndex = new Map<string, ToolEntry>();
  private sourceIndex = new Map<string, SourceEntry>();

  constructor(data: CatalogData) {
    const parsed = catalogSchema.parse(data);
    this.tools = parsed.tools;
    this.sources = parsed.sources;
    this.languages = parsed.languages;

    for (const tool of parsed.tools) {
      for (const label of [tool.key, tool.nameEs, tool.nameEn, String(tool.id)]) {
        this.register(this.toolIndex, label, tool, 'tool');
      }
    }
    for (const source of parsed.sources) {
      for (const label of [source.key, source.displayName, ...source.aliases, String(source.id)]) {
        this.register(this.sourceIndex, label, source, 'source');
      }
    }
  }

  resolveTool(input: string): ToolEntry | undefined {
    return this.toolIndex.get(normalizeLabel(input));
  }

  resolveSource(input: string): SourceEntry | undefined {
    return this.sourceIndex.get(normalizeLabel(input));
  }

  resolveLanguage(input: string): Language | undefined {
    const normalized = normalizeLabel(input);
    return this.languages.find((language) => language === normalized);
  }

  toolName(toolKey: string, language: Language): string {
    const tool = this.resolveTool(toolKey);
    if (!tool) return toolKey;
    return language === 'es' ? tool.nameEs : tool.nameEn;
  }

  sourceName(sourceKey: string): string {
    return this.resolveSource(sourceKey)?.displayName ?? sourceKey;
  }

  private register<T extends { key: string }>(index: Map<string, T>, label: string, entry: T, kind: string): void {
    const normalized = normalizeLabel(label);
    const existing = index.get(normalized);
    if (existing && existing.key !== entry.key) {
      throw new Error(`Catalog ${kind} label "${label}" is ambiguous between ${existing.key} and ${entry.key}`);
    }
    index.set(normalized, entry);
  }
}

export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): Catalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return new Catalog(catalogSchema.parse(raw));
}
