import type { ClarifyingQuestion, IntentName } from "../contracts/intent";

export type ClarificationRecord = {
  conversationId: string;
  round: number;
  pending: boolean;
  question?: ClarifyingQuestion;
  lastPrompt: string;
  lastIntent: IntentName;
  updatedAt: string;
};

/**
 * Server-side clarification rounds keyed by conversation. The client never
 * supplies the round, so it cannot reset the bound by replaying a request.
 */
export interface ClarificationStore {
  get(conversationId: string): Promise<ClarificationRecord | null>;

  recordQuestion(args: {
    conversationId: string;
    question: ClarifyingQuestion;
    prompt: string;
    intent: IntentName;
  }): Promise<ClarificationRecord>;

  resolve(conversationId: string): Promise<void>;
}

export class MemoryClarificationStore implements ClarificationStore {
  private records = new Map<string, ClarificationRecord>();

  constructor(
    private readonly opts: { ttlMs?: number; now?: () => number } = {}
  ) {}

  private now(): number {
    return this.opts.now ? this.opts.now() : Date.now();
  }

  private isExpired(record: ClarificationRecord, now: number): boolean {
    const ttlMs = this.opts.ttlMs ?? 30 * 60 * 1000;
    return now - Date.parse(record.updatedAt) > ttlMs;
  }

  /** Conversations abandoned mid-clarification are never read again, so expiry cannot wait for a get. */
  private sweep(now: number): void {
    for (const [conversationId, record] of this.records) {
      if (this.isExpired(record, now)) this.records.delete(conversationId);
    }
  }

  get size(): number {
    return this.records.size;
  }

  async get(conversationId: string): Promise<ClarificationRecord | null> {
    const record = this.records.get(conversationId);
    if (!record) return null;
    if (this.isExpired(record, this.now())) {
      this.records.delete(conversationId);
      return null;
    }
    return { ...record };
  }

  async recordQuestion(args: {
    conversationId: string;
    question: ClarifyingQuestion;
    prompt: string;
    intent: IntentName;
  }): Promise<ClarificationRecord> {
    this.sweep(this.now());
    const existing = await this.get(args.conversationId);
    const record: ClarificationRecord = {
      conversationId: args.conversationId,
      round: (existing?.round ?? 0) + 1,
      pending: true,
      question: args.question,
      lastPrompt: args.prompt,
      lastIntent: args.intent,
      updatedAt: new Date(this.now()).toISOString(),
    };
    this.records.set(args.conversationId, record);
    return { ...record };
  }

  async resolve(conversationId: string): Promise<void> {
    this.records.delete(conversationId);
  }
}
