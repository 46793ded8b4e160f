/**
 * Извлечение юридических маркеров из текста чанка
 * (статья, глава, раздел, решение суда, ссылки на закон и декрет)
 */

import type { ExtractedMetadata } from './types';

// "Artículo 131." / "ARTÍCULO 131A:" / "Art. 5"-подобные варианты с точкой
const ARTICLE_PATTERN = /art[íi]culo\.?\s*(\d+[a-z]?)[.\-\s:]/iu;

// Слово в любом регистре, отдельно ("Subtítulo" не считается).
// Цифра римская (заглавная) или арабская, затем необязательный заголовок до конца строки.
const TITLE_PATTERN =
  /(?<!\p{L})[Tt][ÍIíi][Tt][Uu][Ll][Oo]\s+([IVXLCDM]+|\d+)(?![\p{L}\d])[.\-\t ]*([^\n]*)/u;
const CHAPTER_PATTERN =
  /(?<!\p{L})[Cc][Aa][Pp][ÍIíi][Tt][Uu][Ll][Oo]\s+([IVXLCDM]+|\d+)(?![\p{L}\d])[.\-\t ]*([^\n]*)/u;

const SENTENCIA_PATTERN = /(?:Sentencia\s+)?\b(SU|[CTSU])-(\d+)\s+de\s+(\d{4})/iu;
const LAW_PATTERN = /\bLey\s+(\d+)\s+de\s+(\d{4})/iu;
const DECREE_PATTERN = /\bDecreto\s+(\d+)\s+de\s+(\d{4})/iu;

// Заголовок секции в гайдах, обрамлённый строками из "="
const SECTION_PATTERN = /^=+\n([^\n=]+)\n=+/mu;

function withHeading(label: string, heading: string | undefined): string {
  const trimmed = heading?.trim();
  return trimmed ? `${label} - ${trimmed}` : label;
}

/**
 * Извлекает метаданные из одного чанка. Чистая функция, без состояния.
 */
export function extractMetadata(text: string): ExtractedMetadata {
  const info: ExtractedMetadata = {};

  const article = ARTICLE_PATTERN.exec(text);
  if (article) {
    info.article = `Artículo ${article[1]}`;
  }

  const title = TITLE_PATTERN.exec(text);
  if (title) {
    info.title = withHeading(`Título ${title[1]}`, title[2]);
  }

  const chapter = CHAPTER_PATTERN.exec(text);
  if (chapter) {
    info.chapter = withHeading(`Capítulo ${chapter[1]}`, chapter[2]);
  }

  const sentencia = SENTENCIA_PATTERN.exec(text);
  if (sentencia) {
    info.sentencia = `Sentencia ${sentencia[1].toUpperCase()}-${sentencia[2]} de ${sentencia[3]}`;
  }

  const law = LAW_PATTERN.exec(text);
  if (law) {
    info.lawReference = `Ley ${law[1]} de ${law[2]}`;
  }

  const decree = DECREE_PATTERN.exec(text);
  if (decree) {
    info.decreeReference = `Decreto ${decree[1]} de ${decree[2]}`;
  }

  const section = SECTION_PATTERN.exec(text);
  if (section) {
    info.section = section[1].trim();
  }

  return info;
}

/**
 * Последние увиденные в документе статья / глава / раздел
 */
export interface StructureContext {
  article?: string;
  chapter?: string;
  title?: string;
}

export const EMPTY_CONTEXT: StructureContext = {};

/**
 * Переносит контекст предыдущих чанков на текущий.
 * Явные значения чанка обновляют контекст, отсутствующие берутся из него.
 */
export function carryForward(
  context: StructureContext,
  extracted: ExtractedMetadata
): { metadata: ExtractedMetadata; context: StructureContext } {
  const next: StructureContext = {
    article: extracted.article ?? context.article,
    chapter: extracted.chapter ?? context.chapter,
    title: extracted.title ?? context.title,
  };

  const metadata: ExtractedMetadata = { ...extracted };
  if (next.article !== undefined) metadata.article = next.article;
  if (next.chapter !== undefined) metadata.chapter = next.chapter;
  if (next.title !== undefined) metadata.title = next.title;

  return { metadata, context: next };
}
