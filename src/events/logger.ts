/**
 * Event logging for resource resolution.
 *
 * Resolution is synchronous, so loggers are too. Events land either in a
 * daily JSONL file (`<dir>/<YYYY-MM-DD>.jsonl`) or on stderr.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

export type ResourceEventType =
  | "resources.bundle.resolved"
  | "resources.bundle.failed";

export interface ResourceEvent {
  type: ResourceEventType;
  actor: string;
  timestamp: string;
  payload: Record<string, unknown>;
}

export interface ResolutionLogger {
  log(type: ResourceEventType, payload: Record<string, unknown>): void;
}

export class JsonlEventLogger implements ResolutionLogger {
  private readonly eventsDir: string;
  private readonly actor: string;
  private readonly now: () => Date;
  private created = false;

  constructor(eventsDir: string, actor: string = "resolver", now: () => Date = () => new Date()) {
    this.eventsDir = eventsDir;
    this.actor = actor;
    this.now = now;
  }

  log(type: ResourceEventType, payload: Record<string, unknown>): void {
    const at = this.now();
    const event: ResourceEvent = {
      type,
      actor: this.actor,
      timestamp: at.toISOString(),
      payload,
    };

    if (!this.created) {
      mkdirSync(this.eventsDir, { recursive: true });
      this.created = true;
    }
    appendFileSync(this.filePathFor(at), JSON.stringify(event) + "\n", "utf-8");
  }

  filePathFor(at: Date): string {
    return join(this.eventsDir, `${at.toISOString().slice(0, 10)}.jsonl`);
  }
}

export class ConsoleEventLogger implements ResolutionLogger {
  log(type: ResourceEventType, payload: Record<string, unknown>): void {
    console.error(`[${type}] ${JSON.stringify(payload)}`);
  }
}
