/**
 * Document Loader Service
 * Turns uploaded files into LangChain documents.
 * Text and markdown are decoded with encoding detection; PDFs go through
 * pdf-parse.
 */

import { Injectable, Logger } from '@nestjs/common';
import { Document } from '@langchain/core/documents';
import * as chardet from 'chardet';
import * as iconv from 'iconv-lite';
import pdfParse from 'pdf-parse';
import * as path from 'path';
import { UnsupportedDocumentError } from '../errors/chat-errors';

/**
 * Uploaded file as received from the multipart interceptor
 */
export interface UploadedDocument {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
}

type DocumentKind = 'text' | 'pdf';

const MIME_TO_KIND: Record<string, DocumentKind> = {
  'text/plain': 'text',
  'text/markdown': 'text',
  'text/x-markdown': 'text',
  'application/pdf': 'pdf',
};

const EXTENSION_TO_KIND: Record<string, DocumentKind> = {
  '.txt': 'text',
  '.md': 'text',
  '.markdown': 'text',
  '.pdf': 'pdf',
};

@Injectable()
export class DocumentLoaderService {
  private readonly logger = new Logger(DocumentLoaderService.name);

  /**
   * @returns null when the file has no text content
   * @throws UnsupportedDocumentError for anything but text, markdown and PDF
   */
  async load(file: UploadedDocument): Promise<Document | null> {
    const kind = this.selectKind(file);
    const content =
      kind === 'pdf'
        ? await this.extractPdfText(file)
        : this.decodeText(file.buffer);

    if (content.trim().length === 0) {
      this.logger.warn(`Skipping empty document: ${file.originalname}`);
      return null;
    }

    this.logger.log(
      `Loaded ${kind} document ${file.originalname}: ${content.length} characters`,
    );

    return new Document({
      pageContent: content,
      metadata: { source: file.originalname, documentType: kind },
    });
  }

  private selectKind(file: UploadedDocument): DocumentKind {
    const fromMime = MIME_TO_KIND[file.mimetype];
    if (fromMime) {
      return fromMime;
    }

    const extension = path.extname(file.originalname).toLowerCase();
    const fromExtension = EXTENSION_TO_KIND[extension];
    if (fromExtension) {
      return fromExtension;
    }

    throw new UnsupportedDocumentError(file.originalname, file.mimetype);
  }

  private async extractPdfText(file: UploadedDocument): Promise<string> {
    const result = await pdfParse(file.buffer);
    this.logger.log(
      `Parsed PDF ${file.originalname}: ${result.numpages} pages`,
    );
    return result.text;
  }

  /**
   * Detect encoding, strip BOM, normalise CRLF
   */
  private decodeText(buffer: Buffer): string {
    const detected = chardet.detect(buffer);
    const encoding =
      detected && iconv.encodingExists(detected) ? detected : 'utf-8';

    let content = iconv.decode(buffer, encoding);

    if (content.charCodeAt(0) === 0xfeff) {
      content = content.slice(1);
    }

    return content.replace(/\r\n/g, '\n');
  }
}
