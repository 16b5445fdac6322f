import pdfParse from 'pdf-parse';
import mammoth from 'mammoth';
import { ExtractedText } from '../types';

export type DocumentExtractor = (bytes: Buffer) => Promise<ExtractedText>;

/**
 * pdf-parse reads the whole ArrayBuffer behind a Buffer. Small Buffers share
 * Node's allocation pool, so they are copied into memory of their own first.
 */
function ownedCopy(bytes: Buffer): Buffer {
  return Buffer.from(bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength));
}

/**
 * Extracts the text of every page, in page order. Resolves to null when the
 * document cannot be parsed; never rejects.
 */
export const extractPdfText: DocumentExtractor = async bytes => {
  try {
    const pdfData = await pdfParse(ownedCopy(bytes));
    console.log(`📄 Extracted ${pdfData.text.length} characters from ${pdfData.numpages} PDF page(s)`);
    return pdfData.text;
  } catch (error) {
    console.error('❌ Error reading PDF:', error);
    return null;
  }
};

/**
 * Extracts paragraph text, one paragraph per line. Resolves to null when the
 * document cannot be parsed; never rejects.
 */
export const extractDocxText: DocumentExtractor = async bytes => {
  try {
    const result = await mammoth.extractRawText({ buffer: bytes });
    // mammoth ends every paragraph with a blank line
    const text = result.value.replace(/\n\n/g, '\n');
    console.log(`📄 Extracted ${text.length} characters from DOCX`);
    return text;
  } catch (error) {
    console.error('❌ Error reading DOCX:', error);
    return null;
  }
};
