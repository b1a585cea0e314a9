import type { KernelEnvelope } from "./messages.js";

export type ReceiveHandler = (raw: unknown) => void;
export type DisconnectHandler = (reason?: Error) => void;

/**
 * Point-to-point message transport to a single kernel.
 *
 * Inbound messages are handed over undecoded; validating them is the
 * consumer's job.
 */
export interface KernelTransport {
  readonly connected: boolean;
  /** Transmits `envelope` and returns its message id. */
  send(envelope: KernelEnvelope): string;
  onReceive(handler: ReceiveHandler): () => void;
  onDisconnect(handler: DisconnectHandler): () => void;
  close(): void;
}

export interface KernelConnection {
  transport: KernelTransport;
  kernelId?: string;
}

export type KernelConnector = (kernelName: string) => Promise<KernelConnection>;
