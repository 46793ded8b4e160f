/**
 * Форматирование ссылок на нормы и решения суда
 */

import type { ChunkMetadata, ExtractedMetadata, SourceRegistry } from './types';

/**
 * Метаданные, достаточные для ссылки; остальные поля чанка не нужны
 */
export type CitationMetadata = ExtractedMetadata &
  Pick<ChunkMetadata, 'source'> &
  Partial<Pick<ChunkMetadata, 'sourceName'>>;

export interface CitationContext {
  registry: SourceRegistry;
  /** "C-038" → URL решения */
  rulingUrls: ReadonlyMap<string, string>;
}

const REFERENCE_SEPARATOR = ' | ';
const GENERAL_REFERENCE = 'Referencia general';
const RULING_CODE_PATTERN = /\b(SU|[CTSU])-(\d+)/iu;

function sourceDisplayName(metadata: CitationMetadata, registry: SourceRegistry): string {
  return registry.get(metadata.source)?.displayName ?? metadata.sourceName ?? metadata.source;
}

/**
 * Читаемая ссылка: источник | решение | статья | закон/декрет | глава
 */
export function formatReference(metadata: CitationMetadata, registry: SourceRegistry): string {
  const parts: string[] = [];
  const sourceName = sourceDisplayName(metadata, registry);

  if (sourceName) parts.push(sourceName);
  if (metadata.sentencia) parts.push(metadata.sentencia);
  if (metadata.article) parts.push(metadata.article);

  // Не повторяем закон, если он уже в названии источника
  if (metadata.lawReference && !sourceName.includes('Ley')) {
    parts.push(metadata.lawReference);
  }
  if (metadata.decreeReference && !sourceName.includes('Decreto')) {
    parts.push(metadata.decreeReference);
  }

  const location = metadata.chapter ?? metadata.title ?? metadata.section;
  if (location) parts.push(location);

  return parts.length > 0 ? parts.join(REFERENCE_SEPARATOR) : GENERAL_REFERENCE;
}

/**
 * URL решения суда, иначе URL источника
 */
export function getCitationUrl(
  metadata: CitationMetadata,
  context: CitationContext
): string | undefined {
  if (metadata.sentencia) {
    const match = RULING_CODE_PATTERN.exec(metadata.sentencia);
    if (match) {
      const rulingUrl = context.rulingUrls.get(`${match[1].toUpperCase()}-${match[2]}`);
      if (rulingUrl) return rulingUrl;
    }
  }

  return context.registry.get(metadata.source)?.url;
}

function sanitizeLinkText(text: string): string {
  return text.replace(/\[/g, '(').replace(/\]/g, ')');
}

function sanitizeLinkUrl(url: string): string {
  return url.replace(/\(/g, '%28').replace(/\)/g, '%29').replace(/ /g, '%20');
}

/**
 * Markdown ссылка `[text](url)`
 */
export function toMarkdownLink(text: string, url: string): string {
  return `[${sanitizeLinkText(text)}](${sanitizeLinkUrl(url)})`;
}

/**
 * Полная ссылка для контекста: ссылкой, если известен URL, иначе текстом
 */
export function formatCitation(metadata: CitationMetadata, context: CitationContext): string {
  const reference = formatReference(metadata, context.registry);
  const url = getCitationUrl(metadata, context);
  return url ? toMarkdownLink(reference, url) : reference;
}

/**
 * Короткая ссылка для списка источников ответа: "Artículo 131, Ley 769 de 2002"
 */
export function formatCitationLink(metadata: CitationMetadata, context: CitationContext): string {
  const source = context.registry.get(metadata.source);
  const parts: string[] = [];

  if (metadata.article) parts.push(metadata.article);
  if (metadata.sentencia) parts.push(metadata.sentencia);

  const shortName =
    source?.shortName ?? source?.displayName ?? metadata.sourceName ?? metadata.source;
  if (shortName && !parts.some(part => part.includes(shortName))) {
    parts.push(shortName);
  }

  const text = parts.length > 0 ? parts.join(', ') : 'Referencia';
  const url = getCitationUrl(metadata, context);
  return url ? toMarkdownLink(text, url) : text;
}
