import { createEnvelope, createReply } from "./envelope.js";
import type { KernelEnvelope } from "./messages.js";
import type {
  DisconnectHandler,
  KernelConnector,
  KernelTransport,
  ReceiveHandler,
} from "./transport.js";

export type MemoryResponder = (
  request: KernelEnvelope,
  kernel: MemoryTransport
) => void;

/**
 * In-process transport: requests go to a responder function standing in for
 * the kernel, which answers through `reply`, `publish` or `deliver`.
 */
export class MemoryTransport implements KernelTransport {
  readonly sent: KernelEnvelope[] = [];
  closeCount = 0;

  private open = true;
  private readonly receivers = new Set<ReceiveHandler>();
  private readonly disconnectHandlers = new Set<DisconnectHandler>();

  constructor(private responder?: MemoryResponder) {}

  get connected(): boolean {
    return this.open;
  }

  respondWith(responder: MemoryResponder | undefined): void {
    this.responder = responder;
  }

  send(envelope: KernelEnvelope): string {
    if (!this.open) {
      throw new Error("Memory transport is closed");
    }
    this.sent.push(envelope);
    this.responder?.(envelope, this);
    return envelope.header.msg_id;
  }

  onReceive(handler: ReceiveHandler): () => void {
    this.receivers.add(handler);
    return () => {
      this.receivers.delete(handler);
    };
  }

  onDisconnect(handler: DisconnectHandler): () => void {
    this.disconnectHandlers.add(handler);
    return () => {
      this.disconnectHandlers.delete(handler);
    };
  }

  close(): void {
    this.closeCount += 1;
    this.disconnect();
  }

  /** Hands a raw message to every receiver, as if the kernel sent it. */
  deliver(raw: unknown): void {
    for (const handler of [...this.receivers]) handler(raw);
  }

  reply(
    request: KernelEnvelope,
    msgType: string,
    content: Record<string, unknown> = {}
  ): KernelEnvelope {
    const envelope = createReply(request, msgType, content);
    this.deliver(envelope);
    return envelope;
  }

  /** Sends an iopub message, parented to `parent` when given. */
  publish(
    parent: KernelEnvelope | undefined,
    msgType: string,
    content: Record<string, unknown> = {},
    buffers: Uint8Array[] = []
  ): KernelEnvelope {
    const envelope = createEnvelope({
      msgType,
      channel: "iopub",
      content,
      buffers,
      session: parent?.header.session ?? "",
      parent: parent?.header,
    });
    this.deliver(envelope);
    return envelope;
  }

  disconnect(reason?: Error): void {
    if (!this.open) return;
    this.open = false;
    for (const handler of [...this.disconnectHandlers]) handler(reason);
  }

  /** Requests of one type, in the order they were sent. */
  requests(msgType: string): KernelEnvelope[] {
    return this.sent.filter((envelope) => envelope.header.msg_type === msgType);
  }
}

/** A connector handing out a fresh `MemoryTransport` per connection. */
export const createMemoryConnector = (
  responder?: MemoryResponder,
  onConnect?: (transport: MemoryTransport, kernelName: string) => void
): KernelConnector => {
  let counter = 0;
  return async (kernelName) => {
    counter += 1;
    const transport = new MemoryTransport(responder);
    onConnect?.(transport, kernelName);
    return { transport, kernelId: `memory-${counter}` };
  };
};
