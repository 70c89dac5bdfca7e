import { Embeddings } from '@langchain/core/embeddings';

export const TEST_VOCABULARY = [
  'capital',
  'freedonia',
  'lumberton',
  'population',
  'people',
  'hello',
] as const;

/**
 * Deterministic embeddings: one dimension per vocabulary word, valued by
 * how often the word occurs. Text with no vocabulary word embeds to zeros.
 */
export class KeywordEmbeddings extends Embeddings {
  readonly embeddedDocuments: string[] = [];
  readonly embeddedQueries: string[] = [];

  constructor(private readonly vocabulary: readonly string[] = TEST_VOCABULARY) {
    super({});
  }

  embed(text: string): number[] {
    const words = text.toLowerCase().split(/[^a-z0-9]+/);
    return this.vocabulary.map(
      (term) => words.filter((word) => word === term).length,
    );
  }

  embedDocuments(documents: string[]): Promise<number[][]> {
    this.embeddedDocuments.push(...documents);
    return Promise.resolve(documents.map((text) => this.embed(text)));
  }

  embedQuery(document: string): Promise<number[]> {
    this.embeddedQueries.push(document);
    return Promise.resolve(this.embed(document));
  }
}
