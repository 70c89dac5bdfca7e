import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SessionRegistryService } from './session-registry.service';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { TextCompletionFactory } from '../services/text-completion.service';
import { DocumentLoaderService } from '../services/document-loader.service';
import { DocumentChunkerService } from '../services/document-chunker.service';
import {
  QDRANT_CLIENT,
  RetrievalIndexFactory,
} from '../index/retrieval-index.factory';
import { ChatPipelineFactory } from '../workflow/chat-pipeline';
import {
  SessionNotFoundError,
  TurnInProgressError,
  UnsupportedDocumentError,
  UnsupportedModelError,
} from '../errors/chat-errors';
import { KeywordEmbeddings } from '../../../test/fakes/keyword-embeddings';
import {
  ScriptedCompletion,
  lineAfter,
} from '../../../test/fakes/scripted-completion';
import { deferred } from '../../../test/fakes/deferred';

const freedonia = {
  originalname: 'freedonia.txt',
  mimetype: 'text/plain',
  buffer: Buffer.from(
    'The capital of Freedonia is Lumberton. Its population is 42,000 people.',
  ),
};

describe('SessionRegistryService', () => {
  let moduleRef: TestingModule;
  let registry: SessionRegistryService;
  let completions: ScriptedCompletion[];
  let nextCompletion: () => ScriptedCompletion;

  beforeEach(async () => {
    completions = [];
    nextCompletion = () => new ScriptedCompletion();

    moduleRef = await Test.createTestingModule({
      providers: [
        {
          provide: ConfigService,
          useValue: new ConfigService({
            VECTOR_STORE: 'memory',
            CHUNK_SIZE: '50',
            CHUNK_OVERLAP: '20',
          }),
        },
        {
          provide: TextCompletionFactory,
          useValue: {
            create: () => {
              const completion = nextCompletion();
              completions.push(completion);
              return completion;
            },
          },
        },
        {
          provide: EmbeddingProviderFactory,
          useValue: {
            createEmbeddingModel: () => ({
              embeddings: new KeywordEmbeddings(),
              provider: 'ollama',
              model: 'keyword-test',
            }),
          },
        },
        { provide: QDRANT_CLIENT, useValue: null },
        LLMProviderFactory,
        DocumentLoaderService,
        DocumentChunkerService,
        RetrievalIndexFactory,
        ChatPipelineFactory,
        SessionRegistryService,
      ],
    }).compile();

    registry = moduleRef.get(SessionRegistryService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('indexes the uploads and registers the session', async () => {
    const session = await registry.createSession([freedonia]);

    expect(session.selection).toEqual({
      provider: 'ollama',
      model: 'gemma3:1b',
    });
    expect(session.documents).toEqual([
      { source: 'freedonia.txt', chunks: 2 },
    ]);
    expect(session.indexedChunks).toBe(2);
    expect(session.embedding).toBe('ollama/keyword-test');
    expect(registry.get(session.id)).toBe(session);
    expect(registry.count()).toBe(1);
  });

  it('accepts an explicit model from the menu', async () => {
    const session = await registry.createSession(
      [freedonia],
      'openai',
      'gpt-4o-mini',
    );

    expect(session.selection).toEqual({
      provider: 'openai',
      model: 'gpt-4o-mini',
    });
  });

  it('rejects models outside the menu without creating a session', async () => {
    await expect(
      registry.createSession([freedonia], 'openai', 'gpt-2'),
    ).rejects.toBeInstanceOf(UnsupportedModelError);
    expect(registry.count()).toBe(0);
  });

  it('rejects unsupported uploads', async () => {
    await expect(
      registry.createSession([
        {
          originalname: 'photo.png',
          mimetype: 'image/png',
          buffer: Buffer.from(''),
        },
      ]),
    ).rejects.toBeInstanceOf(UnsupportedDocumentError);
    expect(registry.count()).toBe(0);
  });

  it('keeps conversation memory separate per session', async () => {
    const first = await registry.createSession([freedonia]);
    const second = await registry.createSession([freedonia]);

    await first.submit('What is the capital of Freedonia?');

    expect(first.history()).toHaveLength(1);
    expect(second.history()).toHaveLength(0);
    expect(completions).toHaveLength(2);
    expect(completions[1].calls).toHaveLength(0);
  });

  it('throws for unknown and closed sessions', async () => {
    const session = await registry.createSession([freedonia]);

    await registry.close(session.id);

    expect(() => registry.get(session.id)).toThrow(SessionNotFoundError);
    expect(() => registry.get('missing')).toThrow(SessionNotFoundError);
    await expect(registry.close('missing')).rejects.toBeInstanceOf(
      SessionNotFoundError,
    );
  });

  it('keeps a busy session registered when asked to close it', async () => {
    const gate = deferred<void>();
    nextCompletion = () =>
      new ScriptedCompletion({
        rewrite: async (prompt) => {
          await gate.promise;
          return lineAfter(prompt, 'Question: ');
        },
      });
    const session = await registry.createSession([freedonia]);

    const turn = session.submit('What is the capital of Freedonia?');

    await expect(registry.close(session.id)).rejects.toBeInstanceOf(
      TurnInProgressError,
    );
    expect(registry.get(session.id)).toBe(session);

    gate.resolve();
    await expect(turn).resolves.toMatchObject({ status: 'answered' });
    await registry.close(session.id);
    expect(registry.count()).toBe(0);
  });

  it('closes idle sessions but never a busy one', async () => {
    const gate = deferred<void>();
    nextCompletion = () =>
      new ScriptedCompletion({
        rewrite: async (prompt) => {
          await gate.promise;
          return lineAfter(prompt, 'Question: ');
        },
      });
    const busy = await registry.createSession([freedonia]);
    nextCompletion = () => new ScriptedCompletion();
    const idle = await registry.createSession([freedonia]);

    const turn = busy.submit('What is the capital of Freedonia?');

    await expect(registry.closeIdle(60_000)).resolves.toBe(0);
    await expect(
      registry.closeIdle(60_000, Date.now() + 120_000),
    ).resolves.toBe(1);
    expect(() => registry.get(idle.id)).toThrow(SessionNotFoundError);
    expect(registry.get(busy.id)).toBe(busy);

    gate.resolve();
    await turn;
  });

  it('closes every session on shutdown', async () => {
    await registry.createSession([freedonia]);
    await registry.createSession([freedonia]);

    await registry.onModuleDestroy();

    expect(registry.count()).toBe(0);
  });
});
