// Timebox — wall-clock ceiling for multi-step research, on an injectable clock

export type Clock = () => number;

export class Timebox {
  private readonly deadline: number;

  constructor(durationMs: number, private readonly clock: Clock = Date.now) {
    this.deadline = clock() + durationMs;
  }

  static minutes(minutes: number, clock: Clock = Date.now): Timebox {
    return new Timebox(minutes * 60_000, clock);
  }

  get expired(): boolean {
    return this.clock() >= this.deadline;
  }
}
