import * as iconv from 'iconv-lite';

/**
 * Décodage des réponses HTTP : essaie plusieurs encodages et garde le meilleur.
 * Les pages Borsa Italiana sont en UTF-8 mais certains exports CSV tiers sont en windows-1252.
 */

export interface DecodeResult {
  text: string;
  encoding: string;
  replacementChars: number;
}

const ENCODINGS = ['utf8', 'windows-1252', 'latin1'] as const;

function countReplacementChars(text: string): number {
  return (text.match(/\uFFFD/g) || []).length;
}

/**
 * Charset annoncé par le Content-Type, normalisé au nom iconv
 */
export function charsetFromContentType(contentType?: string): string | null {
  const match = contentType?.match(/charset\s*=\s*"?([\w-]+)"?/i);
  if (!match) return null;
  const charset = match[1].toLowerCase();
  if (charset === 'utf-8') return 'utf8';
  if (charset === 'iso-8859-1') return 'latin1';
  if (charset === 'cp1252') return 'windows-1252';
  return charset;
}

function calculateDecodeScore(text: string, encoding: string, declared: string | null): number {
  let score = 0;

  // Pénaliser fortement les caractères de remplacement
  score -= countReplacementChars(text) * 10;

  // Séquences typiques d'un UTF-8 lu en latin1 (Ã¨, Ã©...)
  score -= (text.match(/Ã[\u0080-\u00BF]/g) || []).length * 5;

  if (declared && declared === encoding) score += 30;
  if (encoding === 'utf8') score += 5;
  if (encoding === 'latin1') score -= 5;

  return score;
}

export function decodeBest(buffer: Buffer, headers?: Record<string, string>): DecodeResult {
  const contentType = headers?.['content-type'] ?? headers?.['Content-Type'];
  const declared = charsetFromContentType(contentType);

  let best: DecodeResult | null = null;
  let bestScore = -Infinity;

  for (const encoding of ENCODINGS) {
    const text = iconv.decode(buffer, encoding);
    const score = calculateDecodeScore(text, encoding, declared);

    if (score > bestScore) {
      bestScore = score;
      best = { text, encoding, replacementChars: countReplacementChars(text) };
    }
  }

  if (!best) {
    const text = buffer.toString('utf8');
    return { text, encoding: 'utf8', replacementChars: countReplacementChars(text) };
  }

  // Supprimer un éventuel BOM
  return { ...best, text: best.text.replace(/^\uFEFF/, '') };
}
