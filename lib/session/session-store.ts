import type { ConversationTurn } from '../types';

/**
 * In-memory conversation history keyed by thread id. Histories grow until
 * cleared; callers window them before use.
 */
export class SessionStore {
  private sessions = new Map<string, ConversationTurn[]>();
  private tails = new Map<string, Promise<void>>();

  append(threadId: string, turn: ConversationTurn): void {
    const turns = this.sessions.get(threadId);
    if (turns) {
      turns.push({ ...turn });
    } else {
      this.sessions.set(threadId, [{ ...turn }]);
    }
  }

  /** A copy of the thread's turns, oldest first. */
  history(threadId: string): ConversationTurn[] {
    return (this.sessions.get(threadId) ?? []).map((turn) => ({ ...turn }));
  }

  clear(threadId: string): void {
    this.sessions.delete(threadId);
  }

  /**
   * Run `task` after every earlier task on the same thread has settled.
   * Different threads do not wait on each other.
   */
  async runExclusive<T>(threadId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(threadId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(threadId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(threadId) === tail) {
        this.tails.delete(threadId);
      }
    }
  }
}
