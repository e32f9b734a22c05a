import type { JsonObject } from "../core/json.js";

export interface PlanLogEvent {
  ts: string;
  kind: string;
  message: string;
  data: JsonObject | null;
}

/** JSON-lines record of one generation pass. */
export class PlanLog {
  private readonly events: PlanLogEvent[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  event(kind: string, message: string, data: JsonObject | null = null): void {
    this.events.push({ ts: this.now().toISOString(), kind, message, data });
  }

  list(): PlanLogEvent[] {
    return [...this.events];
  }

  text(): string {
    return this.events.map((e) => JSON.stringify(e)).join("\n") + (this.events.length > 0 ? "\n" : "");
  }
}
