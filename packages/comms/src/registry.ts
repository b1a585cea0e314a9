import { nanoid } from "nanoid";
import type { Logger } from "pino";
import { createLogger } from "@cellterm/log-queue";
import {
  GenericComm,
  type Comm,
  type CommChannel,
  type CommData,
  type CommFactory,
  type CommInit,
} from "./comm.js";

/** Maps comm target names to factories, with `GenericComm` as fallback. */
export class CommTargetRegistry {
  private readonly factories = new Map<string, CommFactory>();

  constructor(
    private readonly fallback: CommFactory = (init) => new GenericComm(init)
  ) {}

  register(targetName: string, factory: CommFactory): () => void {
    this.factories.set(targetName, factory);
    return () => {
      if (this.factories.get(targetName) === factory) {
        this.factories.delete(targetName);
      }
    };
  }

  has(targetName: string): boolean {
    return this.factories.has(targetName);
  }

  resolve(targetName: string): CommFactory {
    return this.factories.get(targetName) ?? this.fallback;
  }

  create(init: CommInit): Comm {
    return this.resolve(init.targetName)(init);
  }
}

/** Process-wide targets; starts empty. */
export const defaultCommTargets = new CommTargetRegistry();

export const registerCommTarget = (
  targetName: string,
  factory: CommFactory
): (() => void) => defaultCommTargets.register(targetName, factory);

export type CommSender = (
  msgType: "comm_open" | "comm_msg" | "comm_close",
  content: Record<string, unknown>,
  buffers?: Uint8Array[]
) => void;

export interface CommRegistryOptions {
  send: CommSender;
  targets?: CommTargetRegistry;
  logger?: Logger;
}

/**
 * Open comms of one tab, keyed by `comm_id`. Messages for ids that are not
 * open are dropped: the kernel may still talk to a comm the client already
 * closed.
 */
export class CommRegistry {
  private readonly comms = new Map<string, Comm>();
  private readonly targets: CommTargetRegistry;
  private readonly sendMessage: CommSender;
  private readonly log: Logger;

  constructor(options: CommRegistryOptions) {
    this.sendMessage = options.send;
    this.targets = options.targets ?? defaultCommTargets;
    this.log = options.logger ?? createLogger("comms");
  }

  get size(): number {
    return this.comms.size;
  }

  get(commId: string): Comm | undefined {
    return this.comms.get(commId);
  }

  ids(): string[] {
    return [...this.comms.keys()];
  }

  onOpen(
    commId: string,
    targetName: string,
    data: CommData = {},
    buffers: Uint8Array[] = []
  ): Comm {
    const previous = this.comms.get(commId);
    if (previous) {
      this.log.debug({ commId, targetName }, "Replacing open comm");
      this.comms.delete(commId);
      this.release(previous);
    }
    const comm = this.createComm({ commId, targetName, data, buffers });
    this.comms.set(commId, comm);
    return comm;
  }

  /** Returns whether an open comm took the message. */
  onMessage(
    commId: string,
    data: CommData = {},
    buffers: Uint8Array[] = []
  ): boolean {
    const comm = this.comms.get(commId);
    if (!comm) {
      this.log.debug({ commId }, "Dropping message for unknown comm");
      return false;
    }
    try {
      comm.processData(data, buffers);
    } catch (err) {
      this.log.error({ err, commId }, "Comm failed to process message");
    }
    return true;
  }

  onClose(commId: string, data: CommData = {}, _buffers: Uint8Array[] = []): void {
    const comm = this.comms.get(commId);
    if (!comm) return;
    this.comms.delete(commId);
    this.release(comm, data);
  }

  closeAll(): void {
    const comms = [...this.comms.values()];
    this.comms.clear();
    for (const comm of comms) this.release(comm);
  }

  /** Opens a comm from the client side and announces it to the kernel. */
  open(targetName: string, data: CommData = {}, buffers: Uint8Array[] = []): Comm {
    const commId = nanoid();
    const comm = this.createComm({ commId, targetName, data, buffers });
    this.comms.set(commId, comm);
    this.sendMessage(
      "comm_open",
      { comm_id: commId, target_name: targetName, data },
      buffers
    );
    return comm;
  }

  /**
   * Builds a comm whose channel acts only while that same instance is the
   * one registered under its id.
   */
  private createComm(init: Omit<CommInit, "channel">): Comm {
    const { commId } = init;
    let bound: Comm | undefined;
    const current = (): Comm | undefined =>
      bound && this.comms.get(commId) === bound ? bound : undefined;

    const channel: CommChannel = {
      send: (data, buffers) => {
        if (!current()) return;
        this.sendMessage("comm_msg", { comm_id: commId, data }, buffers);
      },
      close: (data = {}) => {
        const comm = current();
        if (!comm) return;
        this.comms.delete(commId);
        this.sendMessage("comm_close", { comm_id: commId, data });
        this.release(comm, data);
      },
    };

    try {
      bound = this.targets.create({ ...init, channel });
    } catch (err) {
      this.log.warn(
        { err, commId, targetName: init.targetName },
        "Comm target failed; using generic comm"
      );
      bound = new GenericComm({ ...init, channel });
    }
    return bound;
  }

  private release(comm: Comm, data?: CommData) {
    try {
      comm.release(data);
    } catch (err) {
      this.log.warn({ err, commId: comm.commId }, "Comm failed to release");
    }
  }
}
