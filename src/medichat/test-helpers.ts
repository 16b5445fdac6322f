import JSZip from 'jszip';
import { AIGateway } from './types';

function escapePdfString(text: string): string {
  return text.replace(/[\\()]/g, match => `\\${match}`);
}

/**
 * Builds a PDF with one page per entry and a valid xref table. An empty
 * string gives a page with an empty content stream. The result owns its
 * memory rather than sitting in Node's shared allocation pool.
 */
export function buildPdf(pageTexts: string[]): Buffer {
  const pageCount = pageTexts.length;
  const firstPageObject = 4;
  const pageRefs = pageTexts.map((_, index) => `${firstPageObject + index * 2} 0 R`).join(' ');

  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${pageRefs}] /Count ${pageCount} >>`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>'
  ];
  pageTexts.forEach((text, index) => {
    const contentObject = firstPageObject + index * 2 + 1;
    const stream = text === '' ? '' : `BT /F1 12 Tf 72 720 Td (${escapePdfString(text)}) Tj ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${contentObject} 0 R >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`
    );
  });

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  const bytes = Buffer.alloc(pdf.length);
  bytes.write(pdf, 'latin1');
  return bytes;
}

export async function buildDocx(paragraphs: string[]): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    '[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
      '</Types>'
  );
  zip.file(
    '_rels/.rels',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>' +
      '</Relationships>'
  );
  const body = paragraphs.map(text => `<w:p><w:r><w:t xml:space="preserve">${text}</w:t></w:r></w:p>`).join('');
  zip.file(
    'word/document.xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      `<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${body}</w:body></w:document>`
  );
  return zip.generateAsync({ type: 'nodebuffer' });
}

export interface RecordedCall {
  method: 'generateText' | 'analyzeImage';
  args: string[];
}

export class FakeGateway implements AIGateway {
  calls: RecordedCall[] = [];

  constructor(private reply: string = 'fake answer') {}

  async generateText(prompt: string, model?: string): Promise<string> {
    this.calls.push({ method: 'generateText', args: model === undefined ? [prompt] : [prompt, model] });
    return this.reply;
  }

  async analyzeImage(base64Image: string, mimeType: string): Promise<string> {
    this.calls.push({ method: 'analyzeImage', args: [base64Image, mimeType] });
    return this.reply;
  }
}
