export type CommData = Record<string, unknown>;

/** Outbound half of a comm, bound to the session that owns it. */
export interface CommChannel {
  send(data: CommData, buffers?: Uint8Array[]): void;
  close(data?: CommData): void;
}

export interface Comm {
  readonly commId: string;
  readonly targetName: string;
  processData(data: CommData, buffers: Uint8Array[]): void;
  /** Called once when the comm is closed or discarded. */
  release(data?: CommData): void;
}

export interface CommInit {
  commId: string;
  targetName: string;
  data: CommData;
  buffers: Uint8Array[];
  channel: CommChannel;
}

export type CommFactory = (init: CommInit) => Comm;

export abstract class BaseComm implements Comm {
  readonly commId: string;
  readonly targetName: string;
  protected readonly channel: CommChannel;
  private released = false;

  constructor(init: CommInit) {
    this.commId = init.commId;
    this.targetName = init.targetName;
    this.channel = init.channel;
  }

  get closed(): boolean {
    return this.released;
  }

  abstract processData(data: CommData, buffers: Uint8Array[]): void;

  send(data: CommData, buffers?: Uint8Array[]): void {
    if (this.released) return;
    this.channel.send(data, buffers);
  }

  close(data?: CommData): void {
    if (this.released) return;
    this.channel.close(data);
  }

  release(data?: CommData): void {
    if (this.released) return;
    this.released = true;
    this.onRelease(data);
  }

  protected onRelease(_data?: CommData): void {}
}

/**
 * Passthrough comm for targets nothing registered. Keeps the data it was
 * opened with, merges `state` updates and remembers the last message.
 */
export class GenericComm extends BaseComm {
  readonly state: CommData = {};
  lastData: CommData;
  lastBuffers: Uint8Array[];
  messageCount = 0;

  constructor(init: CommInit) {
    super(init);
    this.lastData = init.data;
    this.lastBuffers = init.buffers;
    this.mergeState(init.data);
  }

  processData(data: CommData, buffers: Uint8Array[]): void {
    this.lastData = data;
    this.lastBuffers = buffers;
    this.messageCount += 1;
    this.mergeState(data);
  }

  private mergeState(data: CommData) {
    const state = data.state;
    if (typeof state === "object" && state !== null && !Array.isArray(state)) {
      Object.assign(this.state, state);
    }
  }
}
