import { describe, it, expect, vi } from 'vitest';

const { mockPdfParse, mockExtractRawText } = vi.hoisted(() => ({
  mockPdfParse: vi.fn(),
  mockExtractRawText: vi.fn(),
}));

vi.mock('pdf-parse/lib/pdf-parse.js', () => ({ default: mockPdfParse }));
vi.mock('mammoth', () => ({ default: { extractRawText: mockExtractRawText } }));

import {
  DEFAULT_EXTRACTORS,
  MAX_TEXT_LENGTH,
  docxTextExtractor,
  extractText,
  fixMirroredHebrew,
  pdfTextExtractor,
  plainTextExtractor,
} from '../text-extractor.js';
import type { TextExtractor } from '../text-extractor.js';

function fakeExtractor(name: string, result: string | Error): TextExtractor {
  return {
    name,
    supports: () => true,
    extract: vi.fn(async () => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

describe('extractor candidates', () => {
  it('pdf matches by MIME type or extension', () => {
    expect(pdfTextExtractor.supports('application/pdf', 'x')).toBe(true);
    expect(pdfTextExtractor.supports('application/octet-stream', 'scan.PDF')).toBe(true);
    expect(pdfTextExtractor.supports('image/png', 'scan.png')).toBe(false);
  });

  it('docx and plain text match their types', () => {
    expect(docxTextExtractor.supports('application/octet-stream', 'letter.docx')).toBe(true);
    expect(plainTextExtractor.supports('text/csv', 'data')).toBe(true);
    expect(plainTextExtractor.supports('application/json', 'data')).toBe(true);
    expect(plainTextExtractor.supports('image/jpeg', 'photo.jpg')).toBe(false);
  });

  it('pdf extractor returns the text layer', async () => {
    mockPdfParse.mockResolvedValueOnce({ text: 'Invoice #12' });

    expect(await pdfTextExtractor.extract(Buffer.from('%PDF'))).toBe('Invoice #12');
  });

  it('docx extractor returns the raw text', async () => {
    mockExtractRawText.mockResolvedValueOnce({ value: 'Dear team' });

    expect(await docxTextExtractor.extract(Buffer.from('PK'))).toBe('Dear team');
    expect(mockExtractRawText).toHaveBeenCalledWith({ buffer: Buffer.from('PK') });
  });
});

describe('fixMirroredHebrew', () => {
  it('reverses a line stored in visual order', () => {
    expect(fixMirroredHebrew('ךמס רפסמ 12')).toBe('21 מספר סמך');
  });

  it('reverses only the lines carrying a marker', () => {
    expect(fixMirroredHebrew('שלום עולם\nךאראת 01/02\nTotal')).toBe('שלום עולם\n20/10 תאראך\nTotal');
  });

  it('leaves text without Hebrew untouched', () => {
    expect(fixMirroredHebrew('Invoice #12\nTotal 40')).toBe('Invoice #12\nTotal 40');
  });

  it('is applied to the pdf text layer', async () => {
    mockPdfParse.mockResolvedValueOnce({ text: 'Header\nרובסל הנקה' });

    expect(await pdfTextExtractor.extract(Buffer.from('%PDF'))).toBe('Header\nהקנה לסבור');
  });
});

describe('extractText', () => {
  it('returns trimmed plain text with a note', async () => {
    const result = await extractText(Buffer.from('  hello world \n'), 'text/plain', 'a.txt', DEFAULT_EXTRACTORS);

    expect(result).toEqual({
      text: 'hello world',
      extractor: 'plain',
      note: 'Extracted 11 characters (plain)',
    });
  });

  it('explains when no candidate supports the type', async () => {
    const result = await extractText(Buffer.from('x'), 'image/png', 'photo.png', DEFAULT_EXTRACTORS);

    expect(result).toEqual({
      text: '',
      extractor: null,
      note: 'No text layer available for image/png; the file is attached for AI analysis',
    });
  });

  it('falls through a failing candidate to the next one', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const broken = fakeExtractor('broken', new Error('corrupt xref table'));
    const working = fakeExtractor('working', 'recovered text');

    const result = await extractText(Buffer.from('x'), 'application/pdf', 'a.pdf', [broken, working]);

    expect(result.text).toBe('recovered text');
    expect(result.extractor).toBe('working');
    expect(warn).toHaveBeenCalledWith(
      '[transfer] broken extraction failed for "a.pdf":',
      'corrupt xref table',
    );
    warn.mockRestore();
  });

  it('skips candidates that return only whitespace', async () => {
    const empty = fakeExtractor('empty', '   ');
    const second = fakeExtractor('second', 'text');

    const result = await extractText(Buffer.from('x'), 'application/pdf', 'a.pdf', [empty, second]);

    expect(result.extractor).toBe('second');
  });

  it('returns empty text with a note when every candidate comes up empty', async () => {
    const result = await extractText(Buffer.from('x'), 'application/pdf', 'scan.pdf', [fakeExtractor('empty', '')]);

    expect(result).toEqual({
      text: '',
      extractor: null,
      note: 'No text could be extracted from "scan.pdf" (scanned or image-only content is left to AI analysis)',
    });
  });

  it('truncates text longer than the Airtable field limit', async () => {
    const long = 'a'.repeat(MAX_TEXT_LENGTH + 5);

    const result = await extractText(Buffer.from('x'), 'text/plain', 'big.txt', [fakeExtractor('big', long)]);

    expect(result.text).toHaveLength(MAX_TEXT_LENGTH);
    expect(result.note).toBe(`Text truncated to ${MAX_TEXT_LENGTH} of ${MAX_TEXT_LENGTH + 5} characters`);
  });
});
