import { randomUUID } from "node:crypto";
import { TurnResult } from "../shared/types/screening.types";
import { ConversationFlow } from "./conversation-flow";

export type FlowFactory = (sessionId: string) => ConversationFlow;

interface ManagedSession {
  flow: ConversationFlow;
  queue: Promise<void>;
}

/**
 * In-memory sessions, one flow each. Messages for the same session run one at
 * a time in arrival order; different sessions never share state. A session is
 * released as soon as a turn terminates it (the flow has exported it by then).
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, ManagedSession>();

  constructor(
    private readonly createFlow: FlowFactory,
    private readonly createId: () => string = randomUUID,
  ) {}

  create(): { sessionId: string; greeting: string; flow: ConversationFlow } {
    const sessionId = this.createId();
    if (this.sessions.has(sessionId)) {
      throw new Error(`Session id collision: ${sessionId}`);
    }
    const flow = this.createFlow(sessionId);
    this.sessions.set(sessionId, { flow, queue: Promise.resolve() });
    return { sessionId, greeting: flow.start(), flow };
  }

  get(sessionId: string): ConversationFlow | null {
    return this.sessions.get(sessionId)?.flow ?? null;
  }

  async send(sessionId: string, text: string): Promise<TurnResult | null> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    return this.enqueue(sessionId, session, () => session.flow.handleMessage(text));
  }

  async end(sessionId: string): Promise<TurnResult | null> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    return this.enqueue(sessionId, session, () => session.flow.terminate());
  }

  size(): number {
    return this.sessions.size;
  }

  private enqueue(sessionId: string, session: ManagedSession, task: () => Promise<TurnResult>): Promise<TurnResult> {
    const run = session.queue.then(async () => {
      const result = await task();
      if (result.done && this.sessions.get(sessionId) === session) {
        this.sessions.delete(sessionId);
      }
      return result;
    });
    session.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
