export type OperatorSession =
  | { readonly state: "idle" }
  | { readonly state: "awaitingManualResponse"; readonly messageId: number }
  | { readonly state: "awaitingEditFeedback"; readonly responseId: number };

const IDLE: OperatorSession = { state: "idle" };

/**
 * In-memory, per-operator pending request. One slot per operator: a new
 * request replaces the old one. Nothing survives a restart.
 */
export class OperatorSessionStore {
  private readonly sessions = new Map<string, OperatorSession>();

  get(operatorId: string): OperatorSession {
    return this.sessions.get(operatorId) ?? IDLE;
  }

  set(operatorId: string, session: OperatorSession): void {
    if (session.state === "idle") {
      this.sessions.delete(operatorId);
      return;
    }
    this.sessions.set(operatorId, session);
  }

  clear(operatorId: string): void {
    this.sessions.delete(operatorId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
