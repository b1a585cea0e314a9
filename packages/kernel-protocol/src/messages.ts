import { z } from "zod";

export const KERNEL_PROTOCOL_VERSION = "5.3";

export const KernelChannelSchema = z.enum(["shell", "iopub", "stdin", "control"]);

export const KernelMessageHeaderSchema = z
  .object({
    msg_id: z.string().min(1),
    msg_type: z.string().min(1),
    session: z.string().default(""),
    username: z.string().default(""),
    date: z.string().default(""),
    version: z.string().default(KERNEL_PROTOCOL_VERSION),
  })
  .passthrough();

// Unsolicited messages carry an empty parent header.
export const KernelParentHeaderSchema = z
  .object({
    msg_id: z.string().optional(),
    msg_type: z.string().optional(),
    session: z.string().optional(),
  })
  .passthrough();

const BufferSchema = z.instanceof(Uint8Array);

export const KernelEnvelopeSchema = z.object({
  channel: KernelChannelSchema.default("iopub"),
  header: KernelMessageHeaderSchema,
  parent_header: KernelParentHeaderSchema.default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
  content: z.record(z.string(), z.unknown()).default({}),
  buffers: z.array(BufferSchema).default([]),
});

export const KernelExecutionStateSchema = z.enum([
  "busy",
  "idle",
  "starting",
  "restarting",
  "dead",
]);

export const StatusContentSchema = z
  .object({
    execution_state: KernelExecutionStateSchema,
  })
  .passthrough();

export const LanguageInfoSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
    mimetype: z.string().optional(),
    file_extension: z.string().optional(),
    pygments_lexer: z.string().optional(),
    codemirror_mode: z.unknown().optional(),
  })
  .passthrough();

export const KernelInfoReplyContentSchema = z
  .object({
    status: z.string().optional(),
    protocol_version: z.string().optional(),
    implementation: z.string().optional(),
    implementation_version: z.string().optional(),
    language_info: LanguageInfoSchema.default({}),
    banner: z.string().optional(),
  })
  .passthrough();

export const CommOpenContentSchema = z
  .object({
    comm_id: z.string().min(1),
    target_name: z.string(),
    data: z.record(z.string(), z.unknown()).default({}),
  })
  .passthrough();

export const CommMsgContentSchema = z
  .object({
    comm_id: z.string().min(1),
    data: z.record(z.string(), z.unknown()).default({}),
  })
  .passthrough();

export const CommCloseContentSchema = z
  .object({
    comm_id: z.string().optional(),
    data: z.record(z.string(), z.unknown()).default({}),
  })
  .passthrough();

export const InputRequestContentSchema = z
  .object({
    prompt: z.string().default(""),
    password: z.boolean().default(false),
  })
  .passthrough();

export const ReplyStatusSchema = z.enum(["ok", "error", "abort", "aborted"]);

export const ExecuteReplyContentSchema = z
  .object({
    status: ReplyStatusSchema,
    execution_count: z.number().int().nullable().optional(),
  })
  .passthrough();

export type KernelChannel = z.infer<typeof KernelChannelSchema>;
export type KernelMessageHeader = z.infer<typeof KernelMessageHeaderSchema>;
export type KernelParentHeader = z.infer<typeof KernelParentHeaderSchema>;
export type KernelEnvelope = z.infer<typeof KernelEnvelopeSchema>;
export type KernelExecutionState = z.infer<typeof KernelExecutionStateSchema>;
export type StatusContent = z.infer<typeof StatusContentSchema>;
export type LanguageInfo = z.infer<typeof LanguageInfoSchema>;
export type KernelInfoReplyContent = z.infer<
  typeof KernelInfoReplyContentSchema
>;
export type CommOpenContent = z.infer<typeof CommOpenContentSchema>;
export type CommMsgContent = z.infer<typeof CommMsgContentSchema>;
export type CommCloseContent = z.infer<typeof CommCloseContentSchema>;
export type InputRequestContent = z.infer<typeof InputRequestContentSchema>;
export type ExecuteReplyContent = z.infer<typeof ExecuteReplyContentSchema>;

export type MessageKind =
  | "reply"
  | "status"
  | "output"
  | "comm"
  | "stdin"
  | "other";

const OUTPUT_TYPES = new Set([
  "stream",
  "display_data",
  "update_display_data",
  "execute_result",
  "execute_input",
  "error",
  "clear_output",
]);

const COMM_TYPES = new Set(["comm_open", "comm_msg", "comm_close"]);

/**
 * Buckets a `msg_type` into the dispatch families the session routes on.
 * Anything not recognised falls into "other".
 */
export const classifyMessage = (msgType: string): MessageKind => {
  if (msgType === "status") return "status";
  if (msgType === "input_request") return "stdin";
  if (COMM_TYPES.has(msgType)) return "comm";
  if (OUTPUT_TYPES.has(msgType)) return "output";
  if (msgType.endsWith("_reply")) return "reply";
  return "other";
};
