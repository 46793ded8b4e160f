/**
 * Реестр нормативных источников и ссылок на решения суда
 * Загружается один раз и передаётся в Indexer / Retriever / citations явно
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import type { SourceDocument, SourceRegistry, SourceType } from './types';

export const DEFAULT_SOURCE_PRIORITY = 5;

const SourceTypeSchema = z.enum([
  'ley',
  'decreto',
  'resolucion',
  'jurisprudencia',
  'guia',
  'constitucion',
  'circular',
  'compendio',
  'referencia',
  'manual',
]);

const SourceEntrySchema = z.object({
  name: z.string().min(1),
  short_name: z.string().min(1).optional(),
  type: SourceTypeSchema,
  priority: z.number().int().min(1),
  year: z.number().int(),
  official_source: z.string().optional(),
  url: z.string().url().optional(),
  nota: z.string().optional(),
});

const SourceFileSchema = z.record(z.string(), SourceEntrySchema);

const RulingUrlsSchema = z.record(z.string().regex(/^(SU|[CTSU])-\d+$/), z.string().url());

/**
 * Собирает неизменяемый реестр из готовых записей
 */
export function createSourceRegistry(sources: SourceDocument[]): SourceRegistry {
  return new Map(sources.map((source) => [source.id, Object.freeze({ ...source })]));
}

/**
 * Читает и валидирует data/sources.json
 */
export async function loadSourceRegistry(filePath: string): Promise<SourceRegistry> {
  const raw = await fs.readFile(filePath, 'utf-8');
  const parsed = SourceFileSchema.parse(JSON.parse(raw));

  const sources = Object.entries(parsed).map(([id, entry]): SourceDocument => ({
    id,
    displayName: entry.name,
    shortName: entry.short_name,
    type: entry.type,
    priority: entry.priority,
    year: entry.year,
    officialSource: entry.official_source,
    url: entry.url,
    note: entry.nota,
  }));

  console.log(`[Sources] Загружено ${sources.length} источников из ${filePath}`);
  return createSourceRegistry(sources);
}

/**
 * Читает таблицу "C-038" → URL решения Конституционного суда
 */
export async function loadRulingUrls(filePath: string): Promise<ReadonlyMap<string, string>> {
  const raw = await fs.readFile(filePath, 'utf-8');
  const parsed = RulingUrlsSchema.parse(JSON.parse(raw));
  return new Map(Object.entries(parsed));
}

export interface SourceDescription {
  id: string;
  displayName: string;
  shortName?: string;
  type: SourceType | 'unknown';
  priority: number;
  url?: string;
  known: boolean;
}

/**
 * Описание источника; для неизвестного id - значения по умолчанию
 */
export function describeSource(registry: SourceRegistry, sourceId: string): SourceDescription {
  const source = registry.get(sourceId);
  if (!source) {
    return {
      id: sourceId,
      displayName: sourceId,
      type: 'unknown',
      priority: DEFAULT_SOURCE_PRIORITY,
      known: false,
    };
  }

  return {
    id: source.id,
    displayName: source.displayName,
    shortName: source.shortName,
    type: source.type,
    priority: source.priority,
    url: source.url,
    known: true,
  };
}
