export type KafkaState = "connecting" | "up" | "down";

/**
 * Tracks producer availability. Transitions report the previous state
 * so callers can log only on change.
 */
export class KafkaHealth {
  private state: KafkaState = "connecting";
  private downSince: Date | null = null;

  isAvailable() {
    return this.state === "up";
  }

  current(): { state: KafkaState; downSince: string | null } {
    return { state: this.state, downSince: this.downSince?.toISOString() ?? null };
  }

  markUp(): KafkaState {
    const previous = this.state;
    this.state = "up";
    this.downSince = null;
    return previous;
  }

  markDown(now: Date = new Date()): KafkaState {
    const previous = this.state;
    if (previous !== "down") this.downSince = now;
    this.state = "down";
    return previous;
  }
}
