import { createHash } from 'crypto';
import { CHUNK_OVERLAP, CHUNK_SIZE } from './config';
import type { SourceType } from './types';

export interface TextChunk {
  text: string;
  index: number; // позиция внутри документа
  hash: string;
}

/**
 * Конфигурация для разбивки текста (длины в символах)
 */
export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
}

const DEFAULT_CONFIG: ChunkingConfig = {
  chunkSize: CHUNK_SIZE,
  overlap: CHUNK_OVERLAP,
};

const DEFAULT_SEPARATORS = ['\n\n', '\n', '. ', ' '];

// Законы и декреты режем по статьям, главам и разделам
const LEGAL_SEPARATORS = [
  '\nARTÍCULO', '\nArtículo',
  '\nCAPÍTULO', '\nCapítulo',
  '\nTÍTULO', '\nTítulo',
  '\nPARÁGRAFO', '\nParágrafo',
  ...DEFAULT_SEPARATORS,
];

// Решения суда - по делам и разделам решения
const RULING_SEPARATORS = [
  '\nSentencia', '\nSENTENCIA',
  '\nCONSIDERANDO', '\nRESUELVE',
  ...DEFAULT_SEPARATORS,
];

// Гайды - по визуальным разделителям секций
const GUIDE_SEPARATORS = [
  '\n================', '\n===',
  '\n\n\n',
  ...DEFAULT_SEPARATORS,
];

/**
 * Разделители в порядке приоритета для типа документа
 */
export function getSeparators(docType: SourceType | 'unknown'): string[] {
  switch (docType) {
    case 'ley':
    case 'decreto':
    case 'resolucion':
    case 'constitucion':
      return LEGAL_SEPARATORS;
    case 'jurisprudencia':
      return RULING_SEPARATORS;
    case 'guia':
      return GUIDE_SEPARATORS;
    default:
      return DEFAULT_SEPARATORS;
  }
}

/**
 * Короткий хэш чанка для id и дедупликации
 */
export function computeChunkHash(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex').slice(0, 12);
}

/**
 * Режет текст по разделителю, оставляя разделитель в начале следующего куска
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
  const parts = text.split(separator);
  const pieces = [parts[0], ...parts.slice(1).map((part) => separator + part)];
  return pieces.filter((piece) => piece.length > 0);
}

/**
 * Склеивает соседние куски в чанки до chunkSize.
 * Следующий чанк начинается с хвоста предыдущего длиной не больше overlap.
 */
function mergePieces(pieces: string[], config: ChunkingConfig): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let total = 0;

  const flush = () => {
    const chunk = current.join('').trim();
    if (chunk.length > 0) {
      chunks.push(chunk);
    }
  };

  for (const piece of pieces) {
    if (current.length > 0 && total + piece.length > config.chunkSize) {
      flush();

      // Оставляем хвост для перекрытия
      while (
        current.length > 0 &&
        (total > config.overlap || total + piece.length > config.chunkSize)
      ) {
        total -= current[0].length;
        current = current.slice(1);
      }
    }

    current.push(piece);
    total += piece.length;
  }

  flush();
  return chunks;
}

function splitRecursive(text: string, separators: string[], config: ChunkingConfig): string[] {
  const separatorIndex = separators.findIndex((sep) => text.includes(sep));

  // Делить больше нечем - отдаём как есть, даже если кусок длиннее chunkSize
  if (separatorIndex === -1) {
    const trimmed = text.trim();
    return trimmed.length > 0 ? [trimmed] : [];
  }

  const finer = separators.slice(separatorIndex + 1);
  const pieces = splitKeepingSeparator(text, separators[separatorIndex]);

  const chunks: string[] = [];
  let pending: string[] = [];

  for (const piece of pieces) {
    if (piece.length <= config.chunkSize) {
      pending.push(piece);
      continue;
    }

    if (pending.length > 0) {
      chunks.push(...mergePieces(pending, config));
      pending = [];
    }
    chunks.push(...splitRecursive(piece, finer, config));
  }

  if (pending.length > 0) {
    chunks.push(...mergePieces(pending, config));
  }

  return chunks;
}

/**
 * Разбивает текст на чанки с перекрытием
 * @param text - Исходный текст
 * @param separators - Разделители от крупных к мелким
 * @returns Массив чанков текста
 */
export function splitText(
  text: string,
  separators: string[] = DEFAULT_SEPARATORS,
  config: ChunkingConfig = DEFAULT_CONFIG
): string[] {
  if (config.overlap >= config.chunkSize) {
    throw new Error(
      `Перекрытие (${config.overlap}) должно быть меньше размера чанка (${config.chunkSize})`
    );
  }
  return splitRecursive(text, separators, config);
}

/**
 * Разбивает документ с учётом его юридической структуры
 * @param text - Полный текст документа
 * @param docType - Тип источника из реестра
 * @param config - Конфигурация разбивки
 * @returns Чанки с позицией и хэшем
 */
export function chunkDocument(
  text: string,
  docType: SourceType | 'unknown',
  config: ChunkingConfig = DEFAULT_CONFIG
): TextChunk[] {
  return splitText(text, getSeparators(docType), config).map((chunkText, index) => ({
    text: chunkText,
    index,
    hash: computeChunkHash(chunkText),
  }));
}
