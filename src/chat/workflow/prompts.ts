/**
 * Stage prompts
 * Each stage formats one of these templates into a single prompt string for
 * TextCompletion. Greeting and relevance decisions are left to the model
 * through these instructions; there is no rule engine behind them.
 */

import { PromptTemplate } from '@langchain/core/prompts';
import type { RetrievedPassage } from '../index/retrieval-index';

export const NO_HISTORY = '(no previous conversation)';

export const NO_RELEVANT_FACTS = 'NO_RELEVANT_FACTS';

export const GREETING_RESPONSE =
  'Hello! How can I help you with your documents today?';

export const NO_RELEVANT_DOCUMENTS_MESSAGE =
  "I couldn't find anything relevant to that in your documents. Could you rephrase your question?";

export const REWRITE_PROMPT = PromptTemplate.fromTemplate(
  `You rewrite a user's question into a standalone search query for a document index.

Rules:
1. Keep every domain-specific or technical term exactly as the user wrote it. Never replace a term with a synonym and never invent terminology.
2. Resolve pronouns and references such as "it", "its", "that" or "they" using the conversation history.
3. If the question is already standalone, return it unchanged.
4. Return ONLY the rewritten query on a single line, without quotes or explanations.

Conversation history:
{history}

Question: {question}
Rewritten query:`,
);

export const CONDENSE_PROMPT = PromptTemplate.fromTemplate(
  `You extract facts from retrieved passages for another program to consume.

Rules:
1. Keep only information that helps answer the query and drop everything else.
2. Merge overlapping or complementary passages into one set of facts. Never repeat a fact.
3. Use only information stated in the passages. Do not add outside knowledge or inferences.
4. Output one fact per line, each line starting with "- ".
5. If no passage is relevant, output exactly: ${NO_RELEVANT_FACTS}

Query: {query}

Passages:
{passages}

Facts:`,
);

export const ANSWER_PROMPT = PromptTemplate.fromTemplate(
  `You are a helpful assistant answering questions about the user's uploaded documents.

Rules:
1. If the question is only a greeting or social pleasantry (for example "hello", "hi" or "thanks"), reply exactly: {greeting}
2. Otherwise answer using only the context facts and the conversation history below. If they do not contain the answer, say that the documents do not contain that information.
3. Be concise.

Conversation history:
{history}

Context facts:
{context}

Question: {question}
Answer:`,
);

export function historyOrPlaceholder(rendered: string): string {
  return rendered.trim().length > 0 ? rendered : NO_HISTORY;
}

/**
 * `[1] first passage` lines, numbered in retrieval order
 */
export function formatPassages(passages: RetrievedPassage[]): string {
  return passages
    .map((passage, i) => `[${i + 1}] ${passage.content.replace(/\s+/g, ' ')}`)
    .join('\n');
}
