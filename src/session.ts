import type { Message } from "./types.ts";

/** Confirmed conversation turns. Append-only; the system prompt is never stored. */
export class Session {
  private turns: Message[] = [];

  get messages(): readonly Message[] {
    return this.turns;
  }

  get length(): number {
    return this.turns.length;
  }

  merge(workingSet: readonly Message[]): void {
    this.turns.push(...workingSet);
  }

  snapshot(): Message[] {
    return [...this.turns];
  }
}
