import { BridgeError } from "../lib/errors";

/**
 * Single in-flight exclusion around browser work. A second caller is
 * rejected with Busy, never queued.
 */
export class RequestGate {
  private holder: string | null = null;

  get busy(): boolean {
    return this.holder !== null;
  }

  get activeTask(): string | null {
    return this.holder;
  }

  async run<T>(task: string, work: () => Promise<T>): Promise<T> {
    if (this.holder !== null) {
      throw new BridgeError("BUSY", `Busy with ${this.holder}, try again in a moment.`);
    }
    this.holder = task;
    try {
      return await work();
    } finally {
      this.holder = null;
    }
  }
}
