import { AIMessage, HumanMessage, getBufferString } from '@langchain/core/messages';

/**
 * One completed turn. `question` is what the user typed, not the rewritten
 * query, so later rewrites resolve references against the user's own words.
 */
export interface ConversationTurn {
  question: string;
  answer: string;
}

/**
 * Append-only turn log for one session.
 * Length always equals the number of completed turns.
 */
export class ConversationMemory {
  private readonly turns: ConversationTurn[] = [];

  get length(): number {
    return this.turns.length;
  }

  append(question: string, answer: string): void {
    this.turns.push({ question, answer });
  }

  history(): readonly ConversationTurn[] {
    return this.turns.map((turn) => ({ ...turn }));
  }

  /**
   * Render as `Human: ...` / `AI: ...` lines; empty string when no turns.
   */
  render(): string {
    return getBufferString(
      this.turns.flatMap((turn) => [
        new HumanMessage(turn.question),
        new AIMessage(turn.answer),
      ]),
    );
  }

  /** Whole-session reset */
  clear(): void {
    this.turns.length = 0;
  }
}
