import { Document } from '@langchain/core/documents';
import { ChatPipeline } from './chat-pipeline';
import { GREETING_RESPONSE, NO_RELEVANT_DOCUMENTS_MESSAGE } from './prompts';
import { ConversationMemory } from '../memory/conversation-memory';
import { MemoryRetrievalIndex } from '../index/memory-retrieval-index';
import {
  DEFAULT_MMR_OPTIONS,
  type RetrievedPassage,
} from '../index/retrieval-index';
import {
  BackendFailureError,
  BackendTimeoutError,
  EmptyCompletionError,
} from '../errors/chat-errors';
import { KeywordEmbeddings } from '../../../test/fakes/keyword-embeddings';
import {
  ScriptedCompletion,
  lineAfter,
} from '../../../test/fakes/scripted-completion';

async function freedoniaIndex(): Promise<MemoryRetrievalIndex> {
  const index = new MemoryRetrievalIndex(
    new KeywordEmbeddings(),
    DEFAULT_MMR_OPTIONS,
  );
  await index.addDocuments([
    new Document({
      pageContent: 'The capital of Freedonia is Lumberton. Its',
      metadata: { source: 'freedonia.txt', chunkIndex: 0 },
    }),
    new Document({
      pageContent: 'is Lumberton. Its population is 42,000 people.',
      metadata: { source: 'freedonia.txt', chunkIndex: 1 },
    }),
  ]);
  index.seal();
  return index;
}

// Resolves "its" against the first turn, otherwise echoes the question
function resolvingRewrite(prompt: string): string {
  const question = lineAfter(prompt, 'Question: ');
  if (
    question === 'What about its population?' &&
    prompt.includes('Human: What is the capital of Freedonia?')
  ) {
    return 'What is the population of Freedonia?';
  }
  return question;
}

describe('ChatPipeline', () => {
  let index: MemoryRetrievalIndex;
  let memory: ConversationMemory;
  let completion: ScriptedCompletion;

  const options = { fallbackToOriginal: false, retrievalTimeoutMs: 1000 };

  function pipelineWith(scripted: ScriptedCompletion): ChatPipeline {
    completion = scripted;
    return new ChatPipeline({ completion, index, memory }, options);
  }

  beforeEach(async () => {
    index = await freedoniaIndex();
    memory = new ConversationMemory();
  });

  it('runs the four stages in order', () => {
    expect(pipelineWith(new ScriptedCompletion()).stageNames).toEqual([
      'rewrite',
      'retrieve',
      'condense',
      'answer',
    ]);
  });

  it('answers from the retrieved chunk and records the turn', async () => {
    const pipeline = pipelineWith(new ScriptedCompletion());

    const result = await pipeline.run('What is the capital of Freedonia?');

    expect(result.status).toBe('answered');
    if (result.status !== 'answered') {
      return;
    }
    expect(result.answer).toContain('Lumberton');
    expect(result.sources).toEqual(['freedonia.txt']);
    expect(result.metrics.passageCount).toBe(2);
    expect(completion.calls.map((call) => call.label)).toEqual([
      'rewrite',
      'condense',
      'answer',
    ]);
    expect(memory.history()).toEqual([
      { question: 'What is the capital of Freedonia?', answer: result.answer },
    ]);
  });

  it('condenses the retrieved passages into the answer context', async () => {
    const pipeline = pipelineWith(
      new ScriptedCompletion({ condense: () => '- Lumberton is the capital.' }),
    );

    await pipeline.run('What is the capital of Freedonia?');

    const [condense] = completion.callsFor('condense');
    expect(condense.prompt).toContain(
      '[1] The capital of Freedonia is Lumberton. Its\n[2] is Lumberton. Its population is 42,000 people.',
    );
    const [answer] = completion.callsFor('answer');
    expect(answer.prompt).toContain(
      'Context facts:\n- Lumberton is the capital.\n',
    );
  });

  it('ends the turn early when nothing matches', async () => {
    const pipeline = pipelineWith(new ScriptedCompletion());

    const result = await pipeline.run('asdkfjasldkf');

    expect(result).toEqual({
      status: 'no_relevant_documents',
      message: NO_RELEVANT_DOCUMENTS_MESSAGE,
      rewrittenQuery: 'asdkfjasldkf',
      metrics: expect.objectContaining({ passageCount: 0 }),
    });
    expect(completion.callsFor('condense')).toHaveLength(0);
    expect(completion.callsFor('answer')).toHaveLength(0);
    expect(memory.length).toBe(0);
  });

  it('ends the turn early on an empty index', async () => {
    index = new MemoryRetrievalIndex(
      new KeywordEmbeddings(),
      DEFAULT_MMR_OPTIONS,
    );
    const pipeline = pipelineWith(new ScriptedCompletion());

    const result = await pipeline.run('What is the capital of Freedonia?');

    expect(result.status).toBe('no_relevant_documents');
    expect(completion.callsFor('answer')).toHaveLength(0);
    expect(memory.length).toBe(0);
  });

  it('greets instead of answering from documents', async () => {
    const pipeline = pipelineWith(new ScriptedCompletion());

    const result = await pipeline.run('Hello');

    expect(result).toMatchObject({
      status: 'answered',
      answer: GREETING_RESPONSE,
    });
    expect(completion.callsFor('answer')[0].prompt).toContain(
      `reply exactly: ${GREETING_RESPONSE}`,
    );
  });

  it('resolves a pronoun from the previous turn before retrieval', async () => {
    const search = jest.spyOn(index, 'search');
    const pipeline = pipelineWith(
      new ScriptedCompletion({ rewrite: resolvingRewrite }),
    );

    await pipeline.run('What is the capital of Freedonia?');
    const second = await pipeline.run('What about its population?');

    expect(search).toHaveBeenNthCalledWith(
      2,
      'What is the population of Freedonia?',
      expect.any(AbortSignal),
    );
    expect(second).toMatchObject({
      status: 'answered',
      rewrittenQuery: 'What is the population of Freedonia?',
    });
    if (second.status === 'answered') {
      expect(second.answer).toContain('42,000');
    }
    expect(memory.history().map((turn) => turn.question)).toEqual([
      'What is the capital of Freedonia?',
      'What about its population?',
    ]);
  });

  it('shows the answer stage only the previous turns', async () => {
    const pipeline = pipelineWith(new ScriptedCompletion());

    await pipeline.run('What is the capital of Freedonia?');

    expect(completion.callsFor('answer')[0].prompt).toContain(
      'Conversation history:\n(no previous conversation)\n',
    );
  });

  it('keeps domain terms in the query sent to retrieval', async () => {
    const search = jest.spyOn(index, 'search');
    const pipeline = pipelineWith(new ScriptedCompletion());

    await pipeline.run('Does Freedonia regulate CRISPR-Cas9?');

    expect(search).toHaveBeenCalledWith(
      'Does Freedonia regulate CRISPR-Cas9?',
      expect.any(AbortSignal),
    );
  });

  it('leaves memory unchanged when the answer stage fails', async () => {
    const pipeline = pipelineWith(
      new ScriptedCompletion({
        answer: () => {
          throw new Error('model crashed');
        },
      }),
    );

    await expect(
      pipeline.run('What is the capital of Freedonia?'),
    ).rejects.toMatchObject({
      name: 'BackendFailureError',
      operation: 'completion',
    });
    expect(memory.length).toBe(0);
  });

  it('fails the turn when the rewrite fails and no fallback is set', async () => {
    const search = jest.spyOn(index, 'search');
    const pipeline = pipelineWith(
      new ScriptedCompletion({ rewrite: () => 'Rewritten query:' }),
    );

    await expect(
      pipeline.run('What is the capital of Freedonia?'),
    ).rejects.toBeInstanceOf(EmptyCompletionError);
    expect(search).not.toHaveBeenCalled();
    expect(completion.calls.map((call) => call.label)).toEqual(['rewrite']);
    expect(memory.length).toBe(0);
  });

  it('never reaches the answer stage when condensing fails', async () => {
    const pipeline = pipelineWith(
      new ScriptedCompletion({
        condense: () => {
          throw new Error('context length exceeded');
        },
      }),
    );

    await expect(
      pipeline.run('What is the capital of Freedonia?'),
    ).rejects.toMatchObject({
      name: 'BackendFailureError',
      operation: 'completion',
    });
    expect(completion.callsFor('answer')).toHaveLength(0);
    expect(memory.length).toBe(0);
  });

  it('aborts the turn when retrieval fails', async () => {
    jest
      .spyOn(index, 'search')
      .mockRejectedValue(new Error('connection reset'));
    const pipeline = pipelineWith(new ScriptedCompletion());

    const error: unknown = await pipeline
      .run('What is the capital of Freedonia?')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendFailureError);
    expect(error).toMatchObject({ operation: 'search' });
    expect(completion.callsFor('condense')).toHaveLength(0);
    expect(memory.length).toBe(0);
  });

  it('times out a retrieval that never returns', async () => {
    let searchSignal: AbortSignal | undefined;
    jest.spyOn(index, 'search').mockImplementation((_query, signal) => {
      searchSignal = signal;
      return new Promise<RetrievedPassage[]>(() => undefined);
    });
    completion = new ScriptedCompletion();
    const pipeline = new ChatPipeline(
      { completion, index, memory },
      { ...options, retrievalTimeoutMs: 20 },
    );

    await expect(
      pipeline.run('What is the capital of Freedonia?'),
    ).rejects.toBeInstanceOf(BackendTimeoutError);
    expect(searchSignal?.aborted).toBe(true);
    expect(completion.callsFor('condense')).toHaveLength(0);
    expect(memory.length).toBe(0);
  });
});
