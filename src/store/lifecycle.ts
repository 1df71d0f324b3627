import type { MessageStatus } from "./types.js";

const RANK: Record<MessageStatus, number> = {
  pending: 0,
  processing: 1,
  answered: 2,
  ignored: 2,
};

/** Forward only. Re-applying the current status is allowed and changes nothing. */
export function canTransition(from: MessageStatus, to: MessageStatus): boolean {
  return from === to || RANK[to] > RANK[from];
}

export function isTerminal(status: MessageStatus): boolean {
  return RANK[status] === 2;
}
