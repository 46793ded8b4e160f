/**
 * Типы источников: значения совпадают с реестром data/sources.json
 */
export type SourceType =
  | 'ley'
  | 'decreto'
  | 'resolucion'
  | 'jurisprudencia'
  | 'guia'
  | 'constitucion'
  | 'circular'
  | 'compendio'
  | 'referencia'
  | 'manual';

/**
 * Нормативный документ, который можно проиндексировать
 */
export interface SourceDocument {
  id: string;
  displayName: string;
  shortName?: string;
  type: SourceType;
  priority: number; // 1 = самый авторитетный
  year: number;
  officialSource?: string;
  url?: string;
  note?: string;
}

export type SourceRegistry = ReadonlyMap<string, SourceDocument>;

/**
 * Поля, извлекаемые из текста чанка
 */
export interface ExtractedMetadata {
  article?: string;
  chapter?: string;
  title?: string;
  sentencia?: string;
  lawReference?: string;
  decreeReference?: string;
  section?: string;
}

/**
 * Метаданные чанка в векторном хранилище
 */
export interface ChunkMetadata extends ExtractedMetadata {
  source: string;
  sourceName: string;
  sourceType: SourceType | 'unknown';
  sourcePriority: number;
  chunkIndex: number;
  chunkHash: string;
  filePath?: string;
  indexedAt: string;
}

/**
 * Запись манифеста индексации
 */
export interface ManifestEntry {
  hash: string;
  source_id: string;
  chunk_count: number;
  indexed_at: string;
}

/**
 * Файл манифеста (index_state.json)
 */
export interface IndexManifest {
  indexed_files: Record<string, ManifestEntry>;
  last_update: string | null;
}

/**
 * Документ из data/documents.json
 */
export interface DocumentConfig {
  path: string;
  source_id: string;
}
