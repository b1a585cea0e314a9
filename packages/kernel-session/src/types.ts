import type {
  InputRequestContent,
  KernelChannel,
  KernelConnector,
  KernelEnvelope,
  KernelInfoReplyContent,
} from "@cellterm/kernel-protocol";
import type { Logger } from "pino";

export type KernelStatus = "unknown" | "starting" | "idle" | "busy" | "dead";

export type ReplyOutcome =
  | { status: "ok"; reply: KernelEnvelope }
  | { status: "error"; error: Error };

export type StartOutcome =
  | { status: "ok"; info: KernelInfoReplyContent }
  | { status: "error"; error: Error };

/** Callbacks registered against one outgoing request. */
export interface MessageCallbacks {
  /** Fires at most once, with the reply or the failure that replaced it. */
  onReply?: (outcome: ReplyOutcome) => void;
  /** Broadcast output whose parent is the request. */
  onOutput?: (envelope: KernelEnvelope) => void;
  onInputRequest?: (
    content: InputRequestContent,
    reply: (value: string) => void
  ) => void;
  /**
   * Fires once when no more output will be routed for the request: the
   * kernel went idle for it, or the session was torn down.
   */
  onDone?: () => void;
}

/** Passive hooks registered once by the owning tab. */
export interface KernelSessionHooks {
  status?: (status: KernelStatus, previous: KernelStatus) => void;
  kernelInfo?: (info: KernelInfoReplyContent) => void;
  stdinRequest?: (
    content: InputRequestContent,
    reply: (value: string) => void
  ) => void;
  commOpen?: (envelope: KernelEnvelope) => void;
  commMsg?: (envelope: KernelEnvelope) => void;
  commClose?: (envelope: KernelEnvelope) => void;
  /** Messages nothing else claimed. */
  unhandled?: (envelope: KernelEnvelope) => void;
}

export type Scheduler = (task: () => void) => void;

export type MessageHandler = (envelope: KernelEnvelope) => void;

export interface KernelSessionOptions {
  kernelName: string;
  connect: KernelConnector;
  hooks?: KernelSessionHooks;
  /** Where inbound messages and async callbacks run; synchronous by default. */
  schedule?: Scheduler;
  startTimeoutMs?: number;
  statusTimeoutMs?: number;
  logger?: Logger;
  sessionId?: string;
  username?: string;
  allowStdin?: boolean;
}

export interface SendOptions {
  channel?: KernelChannel;
  buffers?: Uint8Array[];
  metadata?: Record<string, unknown>;
}

export interface StartOptions {
  onStarted?: (outcome: StartOutcome) => void;
  /** Settle the returned promise only once the kernel is ready. */
  wait?: boolean;
}

export interface RestartOptions {
  onRestarted?: (outcome: StartOutcome) => void;
}
