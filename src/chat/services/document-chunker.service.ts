import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { Document } from '@langchain/core/documents';
import type { ChunkMetadata } from '../index/chunk-metadata';

/**
 * Document Chunker Service
 * Fixed-size character chunks with overlap, kept short so each chunk embeds
 * one tightly scoped statement.
 */
@Injectable()
export class DocumentChunkerService {
  private readonly logger = new Logger(DocumentChunkerService.name);
  private readonly splitter: RecursiveCharacterTextSplitter;

  constructor(private readonly configService: ConfigService) {
    const chunkSize = parseInt(
      this.configService.get<string>('CHUNK_SIZE', '50'),
      10,
    );
    const chunkOverlap = parseInt(
      this.configService.get<string>('CHUNK_OVERLAP', '20'),
      10,
    );

    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize,
      chunkOverlap,
    });

    this.logger.log(
      `Chunk splitter initialized: size=${chunkSize} overlap=${chunkOverlap} (characters)`,
    );
  }

  /**
   * Split one loaded document into chunks numbered from 0
   */
  async split(document: Document): Promise<Document<ChunkMetadata>[]> {
    const source =
      typeof document.metadata.source === 'string'
        ? document.metadata.source
        : 'unknown';
    const pieces = await this.splitter.splitText(document.pageContent);

    this.logger.log(`Document ${source} split into ${pieces.length} chunks`);

    return pieces.map(
      (pageContent, chunkIndex) =>
        new Document<ChunkMetadata>({
          pageContent,
          metadata: { source, chunkIndex },
        }),
    );
  }
}
