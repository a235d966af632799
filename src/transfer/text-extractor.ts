/**
 * Text Extraction
 *
 * Pulls a text layer out of staged files so Airtable receives searchable
 * text next to the attachment. Candidates are tried in order; the first one
 * that supports the file and returns non-empty text wins. A failing
 * candidate is logged and the next one is tried; extraction never fails the
 * surrounding transfer.
 *
 * pdf-parse and mammoth are loaded lazily so the server starts without
 * touching them.
 */

import { extname } from 'node:path';
import { errorMessage } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TextExtractor {
  readonly name: string;
  supports(mimeType: string, fileName: string): boolean;
  extract(bytes: Buffer): Promise<string>;
}

export interface ExtractionResult {
  text: string;
  /** Name of the extractor that produced the text, null when none did */
  extractor: string | null;
  /** Human-readable explanation, shown to Airtable users as textNote */
  note: string;
}

/** Airtable long-text fields hold at most 100,000 characters */
export const MAX_TEXT_LENGTH = 100_000;

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
const PLAIN_TEXT_EXTENSIONS = new Set(['.txt', '.md', '.csv', '.json', '.xml', '.html', '.htm']);

function hasExtension(fileName: string, ...extensions: string[]): boolean {
  return extensions.includes(extname(fileName).toLowerCase());
}

// ---------------------------------------------------------------------------
// Hebrew line direction
// ---------------------------------------------------------------------------

const HEBREW = /[\u0590-\u05FF]/;

/**
 * Common words that only appear in this form when a PDF stored a
 * right-to-left line in visual order (e.g. "ךמס" for "סמך").
 */
export const MIRRORED_HEBREW_MARKERS: readonly string[] = ['ךמס', 'ךאראת', 'רובסל', 'יק יק'];

/**
 * Reverses lines that pdf-parse returned mirrored. Only lines carrying a
 * known marker are touched; everything else passes through.
 */
export function fixMirroredHebrew(text: string): string {
  if (!HEBREW.test(text)) return text;

  let fixed = 0;
  const lines = text.split('\n').map((line) => {
    if (!MIRRORED_HEBREW_MARKERS.some((marker) => line.includes(marker))) return line;
    fixed++;
    return Array.from(line).reverse().join('');
  });

  if (fixed > 0) console.log(`[transfer] Reversed ${fixed} mirrored Hebrew line(s)`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Candidates
// ---------------------------------------------------------------------------

type PdfParse = (buffer: Buffer) => Promise<{ text: string }>;
type Mammoth = {
  extractRawText: (input: { buffer: Buffer }) => Promise<{ value: string }>;
};

let pdfParse: PdfParse | null = null;
let mammothModule: Mammoth | null = null;

async function loadPdfParse(): Promise<PdfParse> {
  if (pdfParse === null) {
    const module = await import('pdf-parse/lib/pdf-parse.js');
    pdfParse = module.default;
  }
  return pdfParse;
}

async function loadMammoth(): Promise<Mammoth> {
  if (mammothModule === null) {
    const module = await import('mammoth');
    mammothModule = module.default;
  }
  return mammothModule;
}

/** Embedded text layer of a PDF (no OCR) */
export const pdfTextExtractor: TextExtractor = {
  name: 'pdf',
  supports: (mimeType, fileName) => mimeType === 'application/pdf' || hasExtension(fileName, '.pdf'),
  async extract(bytes) {
    const parse = await loadPdfParse();
    const result = await parse(bytes);
    return fixMirroredHebrew(result.text);
  },
};

export const docxTextExtractor: TextExtractor = {
  name: 'docx',
  supports: (mimeType, fileName) => mimeType === DOCX_MIME || hasExtension(fileName, '.docx'),
  async extract(bytes) {
    const mammoth = await loadMammoth();
    const result = await mammoth.extractRawText({ buffer: bytes });
    return result.value;
  },
};

export const plainTextExtractor: TextExtractor = {
  name: 'plain',
  supports: (mimeType, fileName) =>
    mimeType.startsWith('text/') ||
    mimeType === 'application/json' ||
    PLAIN_TEXT_EXTENSIONS.has(extname(fileName).toLowerCase()),
  async extract(bytes) {
    return bytes.toString('utf-8');
  },
};

export const DEFAULT_EXTRACTORS: readonly TextExtractor[] = [
  pdfTextExtractor,
  docxTextExtractor,
  plainTextExtractor,
];

// ---------------------------------------------------------------------------
// Chain
// ---------------------------------------------------------------------------

/**
 * Runs the candidate chain over one file.
 *
 * Always resolves; an empty `text` comes with a note explaining why.
 */
export async function extractText(
  bytes: Buffer,
  mimeType: string,
  fileName: string,
  extractors: readonly TextExtractor[],
): Promise<ExtractionResult> {
  const candidates = extractors.filter((e) => e.supports(mimeType, fileName));

  if (candidates.length === 0) {
    return {
      text: '',
      extractor: null,
      note: `No text layer available for ${mimeType}; the file is attached for AI analysis`,
    };
  }

  for (const candidate of candidates) {
    let text: string;
    try {
      text = (await candidate.extract(bytes)).trim();
    } catch (err) {
      console.warn(`[transfer] ${candidate.name} extraction failed for "${fileName}":`, errorMessage(err));
      continue;
    }

    if (text.length === 0) continue;

    if (text.length > MAX_TEXT_LENGTH) {
      return {
        text: text.slice(0, MAX_TEXT_LENGTH),
        extractor: candidate.name,
        note: `Text truncated to ${MAX_TEXT_LENGTH} of ${text.length} characters`,
      };
    }

    return {
      text,
      extractor: candidate.name,
      note: `Extracted ${text.length} characters (${candidate.name})`,
    };
  }

  return {
    text: '',
    extractor: null,
    note: `No text could be extracted from "${fileName}" (scanned or image-only content is left to AI analysis)`,
  };
}
