import { NIL_ID } from "./ids.js";

/**
 * The other side of a two-party conversation.
 *
 * For participants [A, B]: A gives B, B gives A. Any other sender, or a
 * participant list that is not a pair, gives NIL_ID.
 */
export function resolveReceiver(senderId: string, participants: readonly string[]): string {
  if (participants.length !== 2) return NIL_ID;

  const sender = senderId.toLowerCase();
  const [first, second] = participants.map((id) => id.toLowerCase());

  if (sender === first) return second;
  if (sender === second) return first;
  return NIL_ID;
}

/** True when participants holds exactly userA and userB, in either order. */
export function isPair(participants: readonly string[], userA: string, userB: string): boolean {
  if (participants.length !== 2) return false;
  const [first, second] = participants.map((id) => id.toLowerCase());
  const a = userA.toLowerCase();
  const b = userB.toLowerCase();
  return (first === a && second === b) || (first === b && second === a);
}
