import type { TextCompletion } from '../../src/chat/services/text-completion.service';
import type { ModelSelection } from '../../src/chat/providers/types';
import { GREETING_RESPONSE } from '../../src/chat/workflow/prompts';

export type StageLabel = 'rewrite' | 'condense' | 'answer';

type Handler = (prompt: string) => string | Promise<string>;

export interface CompletionCall {
  label: string;
  prompt: string;
}

/**
 * Last line of the prompt starting with `prefix`, without the prefix
 */
export function lineAfter(prompt: string, prefix: string): string {
  const line = prompt
    .split('\n')
    .reverse()
    .find((candidate) => candidate.startsWith(prefix));
  return line ? line.slice(prefix.length).trim() : '';
}

/**
 * Text between `start` and the next `end` marker
 */
export function sectionOf(prompt: string, start: string, end: string): string {
  const from = prompt.indexOf(start);
  if (from < 0) {
    return '';
  }
  const body = prompt.slice(from + start.length);
  const to = body.indexOf(end);
  return (to < 0 ? body : body.slice(0, to)).trim();
}

const defaultHandlers: Record<StageLabel, Handler> = {
  // Standalone questions come back unchanged
  rewrite: (prompt) => lineAfter(prompt, 'Question: '),

  // Every numbered passage becomes one fact line
  condense: (prompt) =>
    prompt
      .split('\n')
      .map((line) => /^\[\d+\] (.*)$/.exec(line))
      .flatMap((match) => (match ? [`- ${match[1]}`] : []))
      .join('\n'),

  answer: (prompt) => {
    const question = lineAfter(prompt, 'Question: ');
    if (/^(hello|hi|hey)\b/i.test(question)) {
      return GREETING_RESPONSE;
    }
    return `Based on the documents: ${sectionOf(prompt, 'Context facts:\n', '\n\nQuestion:')}`;
  },
};

/**
 * In-process TextCompletion that answers each stage from a handler and
 * records every prompt it receives.
 */
export class ScriptedCompletion implements TextCompletion {
  readonly selection: ModelSelection = {
    provider: 'ollama',
    model: 'gemma3:1b',
  };
  readonly calls: CompletionCall[] = [];
  private readonly handlers: Record<StageLabel, Handler>;

  constructor(overrides: Partial<Record<StageLabel, Handler>> = {}) {
    this.handlers = { ...defaultHandlers, ...overrides };
  }

  callsFor(label: StageLabel): CompletionCall[] {
    return this.calls.filter((call) => call.label === label);
  }

  async complete(prompt: string, label = 'completion'): Promise<string> {
    this.calls.push({ label, prompt });
    const handler = this.handlerFor(label);
    return handler(prompt);
  }

  private handlerFor(label: string): Handler {
    if (label === 'rewrite' || label === 'condense' || label === 'answer') {
      return this.handlers[label];
    }
    throw new Error(`No scripted handler for ${label}`);
  }
}
