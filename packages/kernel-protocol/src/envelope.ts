import { nanoid } from "nanoid";
import {
  KERNEL_PROTOCOL_VERSION,
  type KernelChannel,
  type KernelEnvelope,
  type KernelParentHeader,
} from "./messages.js";

export interface CreateEnvelopeOptions {
  msgType: string;
  channel?: KernelChannel;
  content?: Record<string, unknown>;
  session: string;
  username?: string;
  parent?: KernelParentHeader;
  metadata?: Record<string, unknown>;
  buffers?: Uint8Array[];
  msgId?: string;
}

export const createMessageId = (): string => nanoid();

export const createEnvelope = (opts: CreateEnvelopeOptions): KernelEnvelope => {
  return {
    channel: opts.channel ?? "shell",
    header: {
      msg_id: opts.msgId ?? createMessageId(),
      msg_type: opts.msgType,
      session: opts.session,
      username: opts.username ?? "",
      date: new Date().toISOString(),
      version: KERNEL_PROTOCOL_VERSION,
    },
    parent_header: opts.parent ?? {},
    metadata: opts.metadata ?? {},
    content: opts.content ?? {},
    buffers: opts.buffers ?? [],
  };
};

/** Builds a message that answers `parent`, as a kernel would. */
export const createReply = (
  parent: KernelEnvelope,
  msgType: string,
  content: Record<string, unknown> = {},
  channel: KernelChannel = parent.channel
): KernelEnvelope => {
  return createEnvelope({
    msgType,
    channel,
    content,
    session: parent.header.session,
    parent: parent.header,
  });
};
