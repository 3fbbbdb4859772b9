import { z } from 'zod';
import keywords from '../../data/escalationKeywords.json';
import { findFirstPhrase, normalizeText } from '../chat/textMatching';

const KeywordListsSchema = z.object({
  intent: z.array(z.string()).min(1),
  confirm: z.array(z.string()).min(1),
  reject: z.array(z.string()).min(1),
  finalize: z.array(z.string()).min(1),
});

export type EscalationKeywordLists = z.infer<typeof KeywordListsSchema>;

export type ConfirmationAnswer = 'confirm' | 'reject' | 'undecided';

export class EscalationDetector {
  private readonly lists: EscalationKeywordLists;

  constructor(lists: unknown = keywords) {
    this.lists = KeywordListsSchema.parse(lists);
  }

  wantsHuman(message: string): boolean {
    return findFirstPhrase(normalizeText(message), this.lists.intent) !== null;
  }

  /** Rejection wins over confirmation: "no, I don't want to" must not escalate. */
  readConfirmation(message: string): ConfirmationAnswer {
    const text = normalizeText(message);
    if (findFirstPhrase(text, this.lists.reject)) return 'reject';
    if (findFirstPhrase(text, this.lists.confirm)) return 'confirm';
    return 'undecided';
  }

  wantsToEndEscalation(message: string): boolean {
    return findFirstPhrase(normalizeText(message), this.lists.finalize) !== null;
  }
}

/** Sessions that were asked "do you want a human?" and have not answered yet. */
export class PendingConfirmations {
  private readonly pending = new Map<string, number>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  mark(sessionId: string) {
    this.pending.set(sessionId, this.now());
  }

  isPending(sessionId: string): boolean {
    const markedAt = this.pending.get(sessionId);
    if (markedAt === undefined) return false;
    if (this.now() - markedAt > this.ttlMs) {
      this.pending.delete(sessionId);
      return false;
    }
    return true;
  }

  clear(sessionId: string) {
    this.pending.delete(sessionId);
  }
}
