import { buildReportPrompt, buildSymptomPrompt } from '../agents/prompts';
import { DocumentExtractor, extractDocxText, extractPdfText } from '../tools/document-extractors';
import { AIGateway, ChatRequestSchema } from '../types';

export const PDF_MIME_TYPE = 'application/pdf';
export const DOCX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const TEXT_MIME_TYPE = 'text/plain';

export class InvalidChatRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidChatRequestError';
  }
}

export interface ChatWorkflowDeps {
  gateway: AIGateway;
  extractPdf?: DocumentExtractor;
  extractDocx?: DocumentExtractor;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Buffer.from silently skips characters outside the alphabet, so the
 * payload is checked first and bad input surfaces as an error.
 */
export function decodeBase64(data: string): Buffer {
  const compact = data.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    throw new InvalidChatRequestError('fileData is not valid base64-encoded content');
  }
  return Buffer.from(compact, 'base64');
}

export class ChatWorkflow {
  private gateway: AIGateway;
  private extractPdf: DocumentExtractor;
  private extractDocx: DocumentExtractor;

  constructor(deps: ChatWorkflowDeps) {
    this.gateway = deps.gateway;
    this.extractPdf = deps.extractPdf ?? extractPdfText;
    this.extractDocx = deps.extractDocx ?? extractDocxText;
  }

  /**
   * Turns one chat request body into the reply text. Failures the user can act
   * on come back as text; anything else rejects.
   */
  async handle(body: unknown): Promise<string> {
    const parsed = ChatRequestSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
        .join('; ');
      throw new InvalidChatRequestError(`Invalid chat request (${issues})`);
    }
    const { message, fileData, fileType, fileName = '' } = parsed.data;

    console.log(`💬 Received chat request. Message: ${message !== undefined}, File: ${fileData !== undefined}`);

    if (fileData && fileType) {
      return this.handleFile(fileData, fileType, fileName);
    }

    if (message) {
      console.log(`💬 Processing text message: '${message.substring(0, 50)}...'`);
      return this.gateway.generateText(buildSymptomPrompt(message));
    }

    return '';
  }

  private async handleFile(fileData: string, fileType: string, fileName: string): Promise<string> {
    console.log(`📎 Processing uploaded file: ${fileName} (Type: ${fileType})`);
    const bytes = decodeBase64(fileData);

    if (fileType.startsWith('image/')) {
      return this.gateway.analyzeImage(fileData, fileType);
    }

    switch (fileType) {
      case PDF_MIME_TYPE: {
        const text = await this.extractPdf(bytes);
        // pdf-parse separates pages with blank lines, so a PDF without text is not ''
        if (!text?.trim()) {
          return `Could not extract text from PDF '${fileName}'. Please ensure it's a readable PDF or describe its content in text.`;
        }
        return this.analyzeText(text, fileName);
      }
      case DOCX_MIME_TYPE: {
        const text = await this.extractDocx(bytes);
        if (!text) {
          return `Could not extract text from DOCX '${fileName}'. Please ensure it's a valid DOCX file or describe its content in text.`;
        }
        return this.analyzeText(text, fileName);
      }
      case TEXT_MIME_TYPE:
        // invalid sequences become U+FFFD instead of failing the request
        return this.analyzeText(bytes.toString('utf8'), fileName);
      default:
        return `Unsupported file type for analysis: ${fileType}. Please upload a PDF, DOCX, image, or plain text file.`;
    }
  }

  private analyzeText(textContent: string, fileName: string): Promise<string> {
    console.log(`🔎 Analyzing text content from file '${fileName}' (length: ${textContent.length} characters)`);
    return this.gateway.generateText(buildReportPrompt(textContent, fileName));
  }
}
