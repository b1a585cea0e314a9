import {
  InputRequestContentSchema,
  KernelEnvelopeSchema,
  KernelInfoReplyContentSchema,
  StatusContentSchema,
  classifyMessage,
  createEnvelope,
  createMessageId,
  type KernelConnection,
  type KernelConnector,
  type KernelEnvelope,
  type KernelInfoReplyContent,
  type MessageKind,
} from "@cellterm/kernel-protocol";
import { createLogger } from "@cellterm/log-queue";
import type { Logger } from "pino";
import {
  KernelDisconnectedError,
  KernelSessionError,
  KernelStartError,
  KernelUnresponsiveError,
} from "./errors.js";
import type {
  KernelSessionHooks,
  KernelSessionOptions,
  KernelStatus,
  MessageCallbacks,
  MessageHandler,
  ReplyOutcome,
  RestartOptions,
  Scheduler,
  SendOptions,
  StartOptions,
  StartOutcome,
} from "./types.js";

const DEFAULT_START_TIMEOUT_MS = 60_000;
const DEFAULT_STATUS_TIMEOUT_MS = 30_000;

const runNow: Scheduler = (task) => task();

interface StatusWaiter {
  target: KernelStatus;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * One kernel's lifecycle and its request/reply conversation.
 *
 * Every inbound message goes through `schedule` before it touches any state,
 * so a host with its own UI queue can hand delivery off to it. Replies are
 * matched to requests by `parent_header.msg_id` and fire once; broadcast
 * output is routed to the request that caused it until the kernel reports
 * idle for that request. Nothing here throws into the caller: failures are
 * logged or handed to callbacks as error outcomes.
 */
export class KernelSession {
  readonly sessionId: string;

  private name: string;
  private currentStatus: KernelStatus = "unknown";
  private connection?: KernelConnection;
  private unsubscribers: Array<() => void> = [];
  private info?: KernelInfoReplyContent;
  private disposed = false;
  private launches = 0;
  private hooks: KernelSessionHooks;

  private readonly connect: KernelConnector;
  private readonly schedule: Scheduler;
  private readonly startTimeoutMs: number;
  private readonly statusTimeoutMs: number;
  private readonly username: string;
  private readonly allowStdin: boolean;
  private readonly log: Logger;

  private readonly pending = new Map<string, (outcome: ReplyOutcome) => void>();
  private readonly routes = new Map<string, MessageCallbacks>();
  private readonly waiters = new Set<StatusWaiter>();
  private readonly messageHandlers = new Map<string, MessageHandler>();
  private readonly kindHandlers: Record<MessageKind, MessageHandler>;

  constructor(options: KernelSessionOptions) {
    this.name = options.kernelName;
    this.connect = options.connect;
    this.hooks = { ...options.hooks };
    this.schedule = options.schedule ?? runNow;
    this.startTimeoutMs = options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
    this.statusTimeoutMs = options.statusTimeoutMs ?? DEFAULT_STATUS_TIMEOUT_MS;
    this.sessionId = options.sessionId ?? createMessageId();
    this.username = options.username ?? "";
    this.allowStdin = options.allowStdin ?? true;
    this.log = options.logger ?? createLogger("kernel-session");

    this.kindHandlers = {
      reply: (envelope) => this.handleReply(envelope),
      status: (envelope) => this.handleStatus(envelope),
      output: (envelope) => this.handleOutput(envelope),
      comm: (envelope) => this.handleComm(envelope),
      stdin: (envelope) => this.handleInputRequest(envelope),
      other: (envelope) => this.handleUnclaimed(envelope),
    };
    this.messageHandlers.set("kernel_info_reply", (envelope) =>
      this.handleKernelInfoReply(envelope)
    );
  }

  get kernelName(): string {
    return this.name;
  }

  get status(): KernelStatus {
    return this.currentStatus;
  }

  get connected(): boolean {
    return this.connection?.transport.connected ?? false;
  }

  get kernelId(): string | undefined {
    return this.connection?.kernelId;
  }

  get kernelInfo(): KernelInfoReplyContent | undefined {
    return this.info;
  }

  /** Number of requests still waiting for a reply. */
  get pendingCount(): number {
    return this.pending.size;
  }

  hasPending(msgId: string): boolean {
    return this.pending.has(msgId);
  }

  setHooks(hooks: KernelSessionHooks): void {
    this.hooks = { ...this.hooks, ...hooks };
  }

  /**
   * Overrides dispatch for one `msg_type`. Returns a function restoring the
   * previous handler.
   */
  registerMessageHandler(msgType: string, handler: MessageHandler): () => void {
    const previous = this.messageHandlers.get(msgType);
    this.messageHandlers.set(msgType, handler);
    return () => {
      if (this.messageHandlers.get(msgType) !== handler) return;
      if (previous) {
        this.messageHandlers.set(msgType, previous);
      } else {
        this.messageHandlers.delete(msgType);
      }
    };
  }

  /**
   * Connects to the kernel and asks for its info. With `wait` the promise
   * settles with the outcome; otherwise it settles at once and `onStarted`
   * is delivered later through the scheduler. Never rejects.
   */
  async start(
    options: StartOptions = {}
  ): Promise<StartOutcome | { status: "pending" }> {
    const attempt = this.launch();
    if (!options.wait) {
      void attempt.then((outcome) =>
        this.schedule(() =>
          this.invoke("onStarted", () => options.onStarted?.(outcome))
        )
      );
      return { status: "pending" };
    }
    const outcome = await attempt;
    this.invoke("onStarted", () => options.onStarted?.(outcome));
    return outcome;
  }

  /**
   * Sends a request and registers `callbacks` against its id. Returns the id,
   * or `undefined` when the kernel is not connected.
   */
  send(
    msgType: string,
    content: Record<string, unknown> = {},
    callbacks: MessageCallbacks = {},
    options: SendOptions = {}
  ): string | undefined {
    const envelope = createEnvelope({
      msgType,
      channel: options.channel ?? "shell",
      content,
      session: this.sessionId,
      username: this.username,
      metadata: options.metadata,
      buffers: options.buffers,
    });
    const id = envelope.header.msg_id;
    if (callbacks.onReply) {
      this.pending.set(id, callbacks.onReply);
    }
    if (callbacks.onOutput || callbacks.onInputRequest || callbacks.onDone) {
      this.routes.set(id, callbacks);
    }
    if (!this.transmit(envelope)) {
      this.pending.delete(id);
      this.routes.delete(id);
      return undefined;
    }
    return id;
  }

  /** Promise form of `send`; resolves with the reply envelope. */
  request(
    msgType: string,
    content: Record<string, unknown> = {},
    options: SendOptions = {}
  ): Promise<KernelEnvelope> {
    return new Promise<KernelEnvelope>((resolve, reject) => {
      const id = this.send(
        msgType,
        content,
        {
          onReply: (outcome) => {
            if (outcome.status === "ok") {
              resolve(outcome.reply);
            } else {
              reject(outcome.error);
            }
          },
        },
        options
      );
      if (id === undefined) {
        reject(
          new KernelSessionError(
            "KERNEL_NOT_CONNECTED",
            `Cannot send ${msgType}: kernel is not connected`
          )
        );
      }
    });
  }

  execute(
    code: string,
    callbacks: MessageCallbacks = {},
    options: { silent?: boolean; storeHistory?: boolean } = {}
  ): string | undefined {
    return this.send(
      "execute_request",
      {
        code,
        silent: options.silent ?? false,
        store_history: options.storeHistory ?? true,
        user_expressions: {},
        allow_stdin: this.allowStdin,
        stop_on_error: true,
      },
      callbacks
    );
  }

  interrupt(): void {
    if (!this.connected) {
      this.log.debug({ kernelName: this.name }, "Interrupt ignored: not connected");
      return;
    }
    this.send("interrupt_request", {}, {}, { channel: "control" });
  }

  /**
   * Restarts the kernel. A connected kernel is asked to restart itself; a
   * dead or never-started one is connected afresh.
   */
  restart(options: RestartOptions = {}): void {
    const done = (outcome: StartOutcome) =>
      this.schedule(() =>
        this.invoke("onRestarted", () => options.onRestarted?.(outcome))
      );

    if (!this.connected) {
      void this.launch().then(done);
      return;
    }

    const id = this.send(
      "shutdown_request",
      { restart: true },
      {
        onReply: (outcome) => {
          if (outcome.status === "error") {
            done(outcome);
            return;
          }
          this.info = undefined;
          this.setStatus("starting");
          void this.requestKernelInfo().then(done);
        },
      },
      { channel: "control" }
    );
    if (id === undefined) {
      done({
        status: "error",
        error: new KernelDisconnectedError("Kernel disconnected before restart"),
      });
    }
  }

  /** Shuts down the current kernel and starts one named `kernelName`. */
  async change(
    kernelName: string,
    options: StartOptions = {}
  ): Promise<StartOutcome | { status: "pending" }> {
    if (this.connected) {
      await this.requestShutdown();
    }
    this.closeConnection();
    this.failAll(new KernelDisconnectedError("Kernel changed"));
    this.name = kernelName;
    this.info = undefined;
    return this.start(options);
  }

  async shutdown(): Promise<void> {
    if (this.connected) {
      await this.requestShutdown();
    }
    this.dispose();
  }

  /** Closes the transport and fails whatever is still waiting. Idempotent. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.closeConnection();
    this.setStatus("dead");
    const error = new KernelDisconnectedError("Kernel session closed");
    this.failAll(error);
    this.failWaiters(error);
  }

  /**
   * Resolves once the status equals `target`; immediately when it already
   * does. Rejects with `KernelUnresponsiveError` after `timeoutMs`.
   */
  waitForStatus(
    target: KernelStatus,
    timeoutMs: number = this.statusTimeoutMs
  ): Promise<void> {
    if (this.currentStatus === target) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: StatusWaiter = {
        target,
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
      const timer = setTimeout(() => {
        this.waiters.delete(waiter);
        reject(
          new KernelUnresponsiveError(
            `Kernel did not become ${target} within ${timeoutMs}ms`
          )
        );
      }, timeoutMs);
      this.waiters.add(waiter);
    });
  }

  private async launch(): Promise<StartOutcome> {
    if (this.disposed) {
      return {
        status: "error",
        error: new KernelSessionError(
          "KERNEL_NOT_CONNECTED",
          "Kernel session has been closed"
        ),
      };
    }
    if (this.connection) {
      this.closeConnection();
      this.failAll(new KernelDisconnectedError("Kernel reconnected"));
    }
    this.info = undefined;
    this.setStatus("starting");

    const launch = ++this.launches;
    const kernelName = this.name;
    let connection: KernelConnection;
    try {
      connection = await this.connect(kernelName);
    } catch (err) {
      if (launch !== this.launches) return this.superseded(kernelName);
      this.log.error({ err, kernelName }, "Kernel failed to start");
      this.setStatus("dead");
      return {
        status: "error",
        error: new KernelStartError(`Failed to start kernel "${kernelName}"`, {
          cause: err,
        }),
      };
    }

    if (this.disposed) {
      connection.transport.close();
      return {
        status: "error",
        error: new KernelDisconnectedError("Kernel session closed while starting"),
      };
    }
    if (launch !== this.launches) {
      this.closeTransport(connection);
      return this.superseded(kernelName);
    }

    this.attach(connection);
    this.log.info(
      { kernelName, kernelId: connection.kernelId },
      "Connected to kernel"
    );
    return this.requestKernelInfo();
  }

  private requestKernelInfo(): Promise<StartOutcome> {
    return new Promise<StartOutcome>((resolve) => {
      let settled = false;
      const finish = (outcome: StartOutcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      };
      const timer = setTimeout(() => {
        this.log.warn(
          { kernelName: this.name, timeoutMs: this.startTimeoutMs },
          "Kernel did not answer kernel_info_request"
        );
        finish({
          status: "error",
          error: new KernelUnresponsiveError(
            `Kernel "${this.name}" did not answer within ${this.startTimeoutMs}ms`
          ),
        });
      }, this.startTimeoutMs);

      const id = this.send(
        "kernel_info_request",
        {},
        {
          onReply: (outcome) => {
            if (outcome.status === "error") {
              finish(outcome);
              return;
            }
            const info = this.info;
            if (!info) {
              finish({
                status: "error",
                error: new KernelStartError("Kernel sent an invalid kernel_info_reply"),
              });
              return;
            }
            this.setStatus("idle");
            finish({ status: "ok", info });
          },
        }
      );
      if (id === undefined) {
        finish({
          status: "error",
          error: new KernelDisconnectedError("Kernel disconnected while starting"),
        });
      }
    });
  }

  private requestShutdown(): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.log.warn({ kernelName: this.name }, "Kernel did not confirm shutdown");
        resolve();
      }, this.statusTimeoutMs);
      const id = this.send(
        "shutdown_request",
        { restart: false },
        {
          onReply: () => {
            clearTimeout(timer);
            resolve();
          },
        },
        { channel: "control" }
      );
      if (id === undefined) {
        clearTimeout(timer);
        resolve();
      }
    });
  }

  private superseded(kernelName: string): StartOutcome {
    this.log.info({ kernelName }, "Dropping kernel connection from a superseded start");
    return {
      status: "error",
      error: new KernelStartError(
        `Start of kernel "${kernelName}" was superseded by a newer start`
      ),
    };
  }

  private attach(connection: KernelConnection) {
    if (this.connection) this.closeConnection();
    this.connection = connection;
    const { transport } = connection;
    this.unsubscribers = [
      transport.onReceive((raw) => this.schedule(() => this.dispatch(raw))),
      transport.onDisconnect((reason) =>
        this.schedule(() => this.handleDisconnect(connection, reason))
      ),
    ];
  }

  private closeConnection() {
    const connection = this.connection;
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    this.connection = undefined;
    if (connection) this.closeTransport(connection);
  }

  private closeTransport(connection: KernelConnection) {
    try {
      connection.transport.close();
    } catch (err) {
      this.log.warn({ err }, "Failed to close kernel transport");
    }
  }

  private handleDisconnect(connection: KernelConnection, reason?: Error) {
    if (this.connection !== connection) return;
    this.log.warn(
      { err: reason, kernelName: this.name },
      "Kernel connection lost"
    );
    this.closeConnection();
    this.setStatus("dead");
    const error = new KernelDisconnectedError("Kernel disconnected", {
      cause: reason,
    });
    this.failAll(error);
    this.failWaiters(error);
  }

  private failAll(error: Error) {
    const pending = [...this.pending.values()];
    const routes = [...this.routes.values()];
    this.pending.clear();
    this.routes.clear();
    for (const handler of pending) {
      this.invoke("onReply", () => handler({ status: "error", error }));
    }
    for (const route of routes) {
      this.invoke("onDone", () => route.onDone?.());
    }
  }

  private failWaiters(error: Error) {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const waiter of waiters) waiter.reject(error);
  }

  private transmit(envelope: KernelEnvelope): boolean {
    const transport = this.connection?.transport;
    const msgType = envelope.header.msg_type;
    if (!transport || !transport.connected) {
      this.log.warn(
        { msgType, kernelName: this.name },
        "Cannot send to kernel: not connected"
      );
      return false;
    }
    try {
      transport.send(envelope);
      return true;
    } catch (err) {
      this.log.warn({ err, msgType }, "Failed to send kernel message");
      return false;
    }
  }

  private dispatch(raw: unknown) {
    if (this.disposed) return;
    const parsed = KernelEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn(
        { issues: parsed.error.issues },
        "Dropping invalid kernel message"
      );
      return;
    }
    const envelope = parsed.data;
    const msgType = envelope.header.msg_type;
    const handler =
      this.messageHandlers.get(msgType) ??
      this.kindHandlers[classifyMessage(msgType)];
    handler(envelope);
  }

  private handleKernelInfoReply(envelope: KernelEnvelope) {
    const parsed = KernelInfoReplyContentSchema.safeParse(envelope.content);
    if (parsed.success) {
      const info = parsed.data;
      this.info = info;
      this.invoke("kernelInfo", () => this.hooks.kernelInfo?.(info));
    } else {
      this.log.warn(
        { issues: parsed.error.issues },
        "Ignoring malformed kernel_info_reply"
      );
    }
    this.handleReply(envelope);
  }

  private handleReply(envelope: KernelEnvelope) {
    const parentId = envelope.parent_header.msg_id;
    const handler = parentId ? this.pending.get(parentId) : undefined;
    if (!parentId || !handler) {
      this.log.debug(
        { msgType: envelope.header.msg_type, parentId },
        "Dropping reply for unknown request"
      );
      return;
    }
    this.pending.delete(parentId);
    this.invoke("onReply", () => handler({ status: "ok", reply: envelope }));
  }

  private handleStatus(envelope: KernelEnvelope) {
    const parsed = StatusContentSchema.safeParse(envelope.content);
    if (!parsed.success) {
      this.log.debug({ content: envelope.content }, "Ignoring malformed status");
      return;
    }
    const state = parsed.data.execution_state;
    this.setStatus(state === "restarting" ? "starting" : state);
    const parentId = envelope.parent_header.msg_id;
    if (state === "idle" && parentId) {
      this.finishRoute(parentId);
    }
  }

  private handleOutput(envelope: KernelEnvelope) {
    const parentId = envelope.parent_header.msg_id;
    const route = parentId ? this.routes.get(parentId) : undefined;
    const onOutput = route?.onOutput;
    if (onOutput) {
      this.invoke("onOutput", () => onOutput(envelope));
      return;
    }
    this.handleUnclaimed(envelope);
  }

  private handleComm(envelope: KernelEnvelope) {
    const msgType = envelope.header.msg_type;
    const hook =
      msgType === "comm_open"
        ? this.hooks.commOpen
        : msgType === "comm_msg"
          ? this.hooks.commMsg
          : this.hooks.commClose;
    if (!hook) {
      this.log.debug({ msgType }, "No comm hook registered");
      return;
    }
    this.invoke(msgType, () => hook(envelope));
  }

  private handleInputRequest(envelope: KernelEnvelope) {
    const parsed = InputRequestContentSchema.safeParse(envelope.content);
    if (!parsed.success) {
      this.log.warn({ content: envelope.content }, "Ignoring malformed input_request");
      return;
    }
    const content = parsed.data;
    const reply = (value: string) => {
      this.transmit(
        createEnvelope({
          msgType: "input_reply",
          channel: "stdin",
          content: { value },
          session: this.sessionId,
          username: this.username,
          parent: envelope.header,
        })
      );
    };
    const parentId = envelope.parent_header.msg_id;
    const onInputRequest = parentId
      ? this.routes.get(parentId)?.onInputRequest
      : undefined;
    const handler = onInputRequest ?? this.hooks.stdinRequest;
    if (!handler) {
      this.log.warn({ parentId }, "Kernel asked for input but nothing can answer");
      return;
    }
    this.invoke("stdinRequest", () => handler(content, reply));
  }

  private handleUnclaimed(envelope: KernelEnvelope) {
    const hook = this.hooks.unhandled;
    if (hook) {
      this.invoke("unhandled", () => hook(envelope));
      return;
    }
    this.log.debug(
      { msgType: envelope.header.msg_type },
      "Unhandled kernel message"
    );
  }

  private finishRoute(msgId: string) {
    const route = this.routes.get(msgId);
    if (!route) return;
    this.routes.delete(msgId);
    this.invoke("onDone", () => route.onDone?.());
  }

  private setStatus(next: KernelStatus) {
    const previous = this.currentStatus;
    if (previous === next) return;
    this.currentStatus = next;
    this.invoke("status", () => this.hooks.status?.(next, previous));
    for (const waiter of [...this.waiters]) {
      if (waiter.target !== next) continue;
      this.waiters.delete(waiter);
      waiter.resolve();
    }
  }

  private invoke(label: string, callback: () => void) {
    try {
      callback();
    } catch (err) {
      this.log.error({ err, callback: label }, "Kernel callback failed");
    }
  }
}
