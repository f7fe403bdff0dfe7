import JSZip from 'jszip';
import type { AnswerSet } from '../common/types/scoring';

/** Strengths in A, gaps in B and E, C and D tied in the middle. */
export const MIXED_ANSWERS: AnswerSet = {
  A1: 5, A2: 5,
  B1: 1, B2: 1,
  C1: 3, C2: 3,
  D1: 3, D2: 3,
  E1: 1, E2: 1,
};

export const ALL_FIVES: AnswerSet = Object.fromEntries(
  ['A1', 'A2', 'B1', 'B2', 'C1', 'C2', 'D1', 'D2', 'E1', 'E2'].map((id) => [id, 5]),
);

export const TEST_ENCRYPTION_KEY = 'ab'.repeat(32);

/** Just enough of a PNG (signature + IHDR) for dimension sniffing. */
export function pngHeader(width: number, height: number): Buffer {
  const buf = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buf, 0);
  buf.writeUInt32BE(13, 8);
  buf.write('IHDR', 12, 'ascii');
  buf.writeUInt32BE(width, 16);
  buf.writeUInt32BE(height, 20);
  buf.writeUInt8(8, 24); // bit depth
  buf.writeUInt8(6, 25); // RGBA
  return buf;
}

export async function readZipText(bytes: Buffer, path: string): Promise<string> {
  const zip = await JSZip.loadAsync(bytes);
  const file = zip.file(path);
  if (!file) throw new Error(`${path} missing`);
  return file.async('string');
}

export function readDocumentXml(bytes: Buffer): Promise<string> {
  return readZipText(bytes, 'word/document.xml');
}

export async function listZipEntries(bytes: Buffer): Promise<string[]> {
  const zip = await JSZip.loadAsync(bytes);
  return Object.keys(zip.files);
}

/** Visible text of each non-empty paragraph, in document order. */
export function paragraphTexts(xml: string): string[] {
  const paragraphs = xml.match(/<w:p(?:\s[^>]*[^/])?>[\s\S]*?<\/w:p>/g) ?? [];
  return paragraphs
    .map((p) =>
      Array.from(p.matchAll(/<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>/g), (m) => unescapeXml(m[1] ?? '')).join(''),
    )
    .filter((text) => text.length > 0);
}

function unescapeXml(str: string): string {
  return str
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}
