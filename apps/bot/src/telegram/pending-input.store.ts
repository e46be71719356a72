export type ManualInputTarget = 'channel' | 'operator';

export interface PendingInput {
  target: ManualInputTarget;
  chatId: number;
  expiresAt: number;
}

export type ConsumedInput =
  | { status: 'none' }
  | { status: 'expired' }
  | { status: 'ready'; session: PendingInput };

/**
 * "Awaiting manual input" sessions, one per operator. Consuming a session
 * always clears it, whatever happens to the message afterwards.
 */
export class PendingInputStore {
  private readonly sessions = new Map<number, PendingInput>();

  constructor(private readonly ttlMs: number) {}

  open(operatorId: number, target: ManualInputTarget, chatId: number, now = Date.now()): PendingInput {
    const session = { target, chatId, expiresAt: now + this.ttlMs };
    this.sessions.set(operatorId, session);
    return session;
  }

  consume(operatorId: number, now = Date.now()): ConsumedInput {
    const session = this.sessions.get(operatorId);
    if (!session) return { status: 'none' };

    this.sessions.delete(operatorId);
    if (now > session.expiresAt) return { status: 'expired' };
    return { status: 'ready', session };
  }

  has(operatorId: number): boolean {
    return this.sessions.has(operatorId);
  }
}
