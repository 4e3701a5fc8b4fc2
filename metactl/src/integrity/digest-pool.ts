import { Worker } from "node:worker_threads";
import { ConfigurationError, TaskExecutionError } from "../core/errors.js";
import type { Hasher } from "./checksum.js";

export const DEFAULT_POOL_SIZE = 2;

// Runs as CommonJS inside each worker thread.
const WORKER_SOURCE = `
const { parentPort } = require("node:worker_threads");
const { createHash } = require("node:crypto");
parentPort.on("message", (task) => {
  try {
    parentPort.postMessage({ id: task.id, digest: createHash("sha1").update(task.bytes).digest("hex") });
  } catch (err) {
    parentPort.postMessage({ id: task.id, error: String(err && err.message ? err.message : err) });
  }
});
`;

type DigestReply = { id: number; digest: string } | { id: number; error: string };

type Pending = {
  resolve: (digest: string) => void;
  reject: (err: Error) => void;
};

type Slot = {
  worker: Worker;
  pending: Map<number, Pending>;
};

function isDigestReply(value: unknown): value is DigestReply {
  if (typeof value !== "object" || value === null) return false;
  if (!("id" in value) || typeof value.id !== "number") return false;
  if ("digest" in value && typeof value.digest === "string") return true;
  return "error" in value && typeof value.error === "string";
}

/**
 * SHA-1 on worker threads, so digesting large payloads never stalls other
 * in-flight requests. Workers start lazily, take tasks round-robin, and are
 * respawned on the next task after a crash.
 *
 * Once `close()` is called every pending and future task rejects with
 * {@link TaskExecutionError}.
 */
export class DigestPool implements Hasher {
  private readonly slots: Array<Slot | undefined>;
  private nextSlot = 0;
  private seq = 0;
  private closed = false;

  constructor(private readonly size: number = DEFAULT_POOL_SIZE) {
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigurationError(`Digest pool size must be a positive integer, got ${size}`);
    }
    this.slots = Array.from({ length: size }, () => undefined);
  }

  digest(bytes: Uint8Array): Promise<string> {
    if (this.closed) {
      return Promise.reject(new TaskExecutionError("Digest pool is closed"));
    }

    const index = this.nextSlot;
    this.nextSlot = (this.nextSlot + 1) % this.size;

    let slot: Slot;
    try {
      slot = this.slotAt(index);
    } catch (err) {
      return Promise.reject(new TaskExecutionError("Failed to start digest worker", err));
    }

    const id = ++this.seq;
    return new Promise<string>((resolve, reject) => {
      slot.pending.set(id, { resolve, reject });
      if (slot.pending.size === 1) slot.worker.ref();
      try {
        slot.worker.postMessage({ id, bytes });
      } catch (err) {
        this.release(slot, id);
        reject(new TaskExecutionError("Failed to dispatch digest task", err));
      }
    });
  }

  /** Number of workers currently running. */
  activeWorkers(): number {
    return this.slots.filter((slot) => slot !== undefined).length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
    const running = this.slots.filter((slot): slot is Slot => slot !== undefined);
    await Promise.all(running.map((slot) => slot.worker.terminate()));
  }

  private slotAt(index: number): Slot {
    const existing = this.slots[index];
    if (existing) return existing;

    const worker = new Worker(WORKER_SOURCE, { eval: true });
    worker.unref();
    const slot: Slot = { worker, pending: new Map() };

    worker.on("message", (message: unknown) => this.settle(index, slot, message));
    worker.on("error", (err) => this.fail(index, slot, new TaskExecutionError("Digest worker crashed", err)));
    worker.on("exit", (code) => this.fail(index, slot, new TaskExecutionError(`Digest worker exited with code ${code}`)));

    this.slots[index] = slot;
    return slot;
  }

  private settle(index: number, slot: Slot, message: unknown): void {
    if (!isDigestReply(message)) {
      this.fail(index, slot, new TaskExecutionError("Malformed reply from digest worker"));
      return;
    }

    const pending = this.release(slot, message.id);
    if (!pending) return;

    if ("digest" in message) {
      pending.resolve(message.digest);
    } else {
      pending.reject(new TaskExecutionError(`Digest task failed: ${message.error}`));
    }
  }

  private release(slot: Slot, id: number): Pending | undefined {
    const pending = slot.pending.get(id);
    slot.pending.delete(id);
    if (slot.pending.size === 0) slot.worker.unref();
    return pending;
  }

  private fail(index: number, slot: Slot, err: TaskExecutionError): void {
    if (this.slots[index] === slot) this.slots[index] = undefined;
    const pending = [...slot.pending.values()];
    slot.pending.clear();
    for (const p of pending) p.reject(err);
  }
}

let shared: DigestPool | undefined;

/** Process-wide pool used by fetchers that are not given a hasher. */
export function sharedDigestPool(size?: number): DigestPool {
  if (!shared || shared.isClosed()) {
    shared = new DigestPool(size);
  }
  return shared;
}

export async function closeSharedDigestPool(): Promise<void> {
  const pool = shared;
  shared = undefined;
  if (pool) await pool.close();
}
