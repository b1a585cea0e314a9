import type { Logger } from "pino";
import {
  CommCloseContentSchema,
  CommMsgContentSchema,
  CommOpenContentSchema,
  type InputRequestContent,
  type KernelConnector,
  type KernelEnvelope,
  type KernelInfoReplyContent,
} from "@cellterm/kernel-protocol";
import {
  KernelSession,
  type KernelStatus,
  type Scheduler,
  type StartOptions,
  type StartOutcome,
} from "@cellterm/kernel-session";
import { CommRegistry, type CommTargetRegistry } from "@cellterm/comms";
import type { EditorConfig } from "@cellterm/config";
import { createLogger } from "@cellterm/log-queue";
import {
  DEFAULT_FILE_EXTENSION,
  parseNotebookMetadata,
  type NotebookMetadata,
} from "./metadata.js";
import type { KernelSpecInfo, KernelSpecSource } from "./specs.js";
import {
  processNotices,
  type NoticeState,
  type TabSurfaces,
} from "./surfaces.js";

export const NO_KERNELS_MESSAGE =
  "No kernels are available. Install a Jupyter kernel to run code.";
export const RESTART_CONFIRMATION = "Are you sure you want to restart the kernel?";

export interface KernelTabOptions {
  config: EditorConfig;
  connect: KernelConnector;
  specs: KernelSpecSource;
  surfaces?: TabSurfaces<KernelTab>;
  /** Shared record of notices already shown; defaults to the process one. */
  notices?: NoticeState;
  metadata?: unknown;
  commTargets?: CommTargetRegistry;
  schedule?: Scheduler;
  logger?: Logger;
}

export interface ChangeKernelOptions {
  message?: string;
  /** Automatic check when a document opens, as opposed to a user request. */
  startup?: boolean;
}

export type StatusListener = (status: KernelStatus, previous: KernelStatus) => void;

/**
 * A document's hold on one kernel: the session, the comms multiplexed over
 * it and the notebook metadata describing which kernel it wants.
 */
export class KernelTab {
  readonly session: KernelSession;
  readonly comms: CommRegistry;

  protected readonly config: EditorConfig;
  protected readonly log: Logger;
  protected readonly surfaces: TabSurfaces<KernelTab>;

  private meta: NotebookMetadata;
  private readonly specs: KernelSpecSource;
  private readonly notices: NoticeState;
  private readonly statusListeners = new Set<StatusListener>();
  private closed = false;

  constructor(options: KernelTabOptions) {
    this.config = options.config;
    this.specs = options.specs;
    this.surfaces = options.surfaces ?? {};
    this.notices = options.notices ?? processNotices;
    this.log = options.logger ?? createLogger("kernel-tab");
    this.meta = parseNotebookMetadata(options.metadata);

    this.session = new KernelSession({
      kernelName: this.kernelName,
      connect: options.connect,
      schedule: options.schedule,
      startTimeoutMs: this.config.kernelStartTimeoutMs,
      statusTimeoutMs: this.config.kernelStatusTimeoutMs,
      logger: this.log,
      hooks: {
        status: (status, previous) => this.notifyStatus(status, previous),
        kernelInfo: (info) => this.setKernelInfo(info),
        stdinRequest: (content, reply) => this.requestInput(content, reply),
        commOpen: (envelope) => this.commOpen(envelope),
        commMsg: (envelope) => this.commMsg(envelope),
        commClose: (envelope) => this.commClose(envelope),
      },
    });

    this.comms = new CommRegistry({
      targets: options.commTargets,
      logger: this.log,
      send: (msgType, content, buffers) => {
        this.session.send(msgType, content, {}, { buffers });
      },
    });
  }

  get metadata(): NotebookMetadata {
    return this.meta;
  }

  get kernelName(): string {
    return this.meta.kernelspec?.name ?? this.config.defaultKernelName;
  }

  set kernelName(name: string) {
    this.meta = {
      ...this.meta,
      kernelspec: { ...this.meta.kernelspec, name },
    };
  }

  get kernelDisplayName(): string {
    return this.meta.kernelspec?.display_name ?? this.kernelName;
  }

  get language(): string | undefined {
    return this.meta.kernelspec?.language ?? this.meta.language_info?.name;
  }

  get fileExtension(): string {
    return this.meta.language_info?.file_extension ?? DEFAULT_FILE_EXTENSION;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  setKernelInfo(info: KernelInfoReplyContent): void {
    this.meta = { ...this.meta, language_info: info.language_info };
  }

  onStatusChange(listener: StatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  /** Starts the kernel named in the metadata. */
  startKernel(
    options: StartOptions = {}
  ): Promise<StartOutcome | { status: "pending" }> {
    if (this.session.kernelName !== this.kernelName) {
      return this.session.change(this.kernelName, options);
    }
    return this.session.start(options);
  }

  /**
   * Offers the available kernels. With none installed a notice is shown,
   * at most once per process for startup checks; a single kernel found at
   * startup is selected without asking.
   */
  async changeKernel(options: ChangeKernelOptions = {}): Promise<void> {
    let specs: Record<string, KernelSpecInfo>;
    try {
      specs = await this.specs.listSpecs();
    } catch (err) {
      this.log.warn({ err }, "Could not list kernel specs");
      specs = {};
    }

    const available = Object.values(specs);
    if (available.length === 0) {
      if (options.startup && this.notices.noKernelsShown) return;
      this.notices.noKernelsShown = true;
      this.showNotice(NO_KERNELS_MESSAGE);
      return;
    }

    const [only] = available;
    if (options.startup && available.length === 1 && only) {
      await this.selectKernel(only);
      return;
    }

    const picker = this.surfaces.picker;
    if (!picker) {
      this.log.info(
        { specs: Object.keys(specs) },
        "No kernel picker available; keeping current kernel"
      );
      return;
    }
    picker.show({ tab: this, message: options.message, specs });
  }

  /** Records `spec` in the metadata and switches the session to it. */
  selectKernel(
    spec: KernelSpecInfo,
    options: StartOptions = {}
  ): Promise<StartOutcome | { status: "pending" }> {
    this.meta = {
      ...this.meta,
      kernelspec: {
        ...this.meta.kernelspec,
        name: spec.name,
        display_name: spec.displayName,
        ...(spec.language ? { language: spec.language } : {}),
      },
    };
    return this.session.change(spec.name, options);
  }

  interruptKernel(): void {
    this.session.interrupt();
  }

  /** Restarts the kernel, after confirmation when the host can ask for it. */
  restartKernel(onRestarted?: (outcome: StartOutcome) => void): void {
    const restart = () => {
      this.session.restart({
        onRestarted: (outcome) => {
          if (outcome.status === "error") {
            this.log.warn({ err: outcome.error }, "Kernel restart failed");
          }
          onRestarted?.(outcome);
        },
      });
    };
    const confirm = this.surfaces.confirm;
    if (confirm) {
      confirm.show(RESTART_CONFIRMATION, restart);
      return;
    }
    restart();
  }

  commOpen(envelope: KernelEnvelope): void {
    const parsed = CommOpenContentSchema.safeParse(envelope.content);
    if (!parsed.success) {
      this.log.debug({ content: envelope.content }, "Ignoring malformed comm_open");
      return;
    }
    const { comm_id, target_name, data } = parsed.data;
    this.comms.onOpen(comm_id, target_name, data, envelope.buffers);
  }

  commMsg(envelope: KernelEnvelope): void {
    const parsed = CommMsgContentSchema.safeParse(envelope.content);
    if (!parsed.success) {
      this.log.debug({ content: envelope.content }, "Ignoring malformed comm_msg");
      return;
    }
    const { comm_id, data } = parsed.data;
    this.comms.onMessage(comm_id, data, envelope.buffers);
  }

  commClose(envelope: KernelEnvelope): void {
    const parsed = CommCloseContentSchema.safeParse(envelope.content);
    const commId = parsed.success ? parsed.data.comm_id : undefined;
    if (!parsed.success || !commId) return;
    this.comms.onClose(commId, parsed.data.data, envelope.buffers);
  }

  /** Releases comms and the kernel. The tab is unusable afterwards. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.comms.closeAll();
    this.session.dispose();
    this.statusListeners.clear();
  }

  protected showNotice(message: string): void {
    const notice = this.surfaces.notice;
    if (notice) {
      notice.show(message);
      return;
    }
    this.log.warn(message);
  }

  private requestInput(
    content: InputRequestContent,
    reply: (value: string) => void
  ) {
    const input = this.surfaces.input;
    if (input) {
      input.prompt(content, reply);
      return;
    }
    this.log.warn(
      { prompt: content.prompt },
      "Kernel asked for input but no input surface is available"
    );
    reply("");
  }

  private notifyStatus(status: KernelStatus, previous: KernelStatus) {
    for (const listener of [...this.statusListeners]) {
      try {
        listener(status, previous);
      } catch (err) {
        this.log.error({ err }, "Status listener failed");
      }
    }
  }
}
