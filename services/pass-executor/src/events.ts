import { EventEmitter } from "events";
import type { StatusEvent } from "@groundtrack/shared";

export type StatusListener = (event: StatusEvent) => void;

/** Fan-out of job status changes to monitoring and API collaborators. */
export class StatusEventBus {
  private readonly emitter = new EventEmitter();

  publish(event: StatusEvent): void {
    this.emitter.emit("status", event);
  }

  subscribe(listener: StatusListener): () => void {
    this.emitter.on("status", listener);
    return () => {
      this.emitter.off("status", listener);
    };
  }

  get listenerCount(): number {
    return this.emitter.listenerCount("status");
  }
}
