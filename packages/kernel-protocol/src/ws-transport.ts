import WebSocket, { type RawData } from "ws";
import type { Logger } from "pino";
import { createLogger } from "@cellterm/log-queue";
import { createMessageId } from "./envelope.js";
import type { KernelEnvelope } from "./messages.js";
import type {
  DisconnectHandler,
  KernelConnector,
  KernelTransport,
  ReceiveHandler,
} from "./transport.js";
import { decodeFrame, encodeFrame } from "./ws-codec.js";

/** The slice of a websocket the transport relies on. */
export interface KernelSocket {
  readonly open: boolean;
  send(data: string | Uint8Array): void;
  close(): void;
  onMessage(listener: (data: string | Uint8Array) => void): void;
  onClose(listener: (reason?: Error) => void): void;
}

const textDecoder = new TextDecoder();

const toBytes = (data: RawData): Uint8Array => {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
};

export const adaptWebSocket = (ws: WebSocket): KernelSocket => {
  let lastError: Error | undefined;
  ws.on("error", (err) => {
    lastError = err;
  });
  return {
    get open() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (data) => ws.send(data),
    close: () => ws.close(),
    onMessage: (listener) => {
      ws.on("message", (data, isBinary) => {
        const bytes = toBytes(data);
        listener(isBinary ? bytes : textDecoder.decode(bytes));
      });
    },
    onClose: (listener) => {
      ws.on("close", (code, reason) => {
        if (code === 1000 && !lastError) {
          listener();
          return;
        }
        listener(
          lastError ??
            new Error(`Kernel websocket closed (${code}) ${reason.toString()}`)
        );
      });
    },
  };
};

export interface WebSocketTransportOptions {
  logger?: Logger;
}

export class WebSocketTransport implements KernelTransport {
  private readonly receivers = new Set<ReceiveHandler>();
  private readonly disconnectHandlers = new Set<DisconnectHandler>();
  private readonly log: Logger;
  private closed = false;
  private disconnected = false;

  constructor(
    private readonly socket: KernelSocket,
    options: WebSocketTransportOptions = {}
  ) {
    this.log = options.logger ?? createLogger("kernel-transport");
    socket.onMessage((data) => this.receive(data));
    socket.onClose((reason) => this.disconnect(reason));
  }

  get connected(): boolean {
    return !this.closed && !this.disconnected && this.socket.open;
  }

  send(envelope: KernelEnvelope): string {
    if (!this.connected) {
      throw new Error("Kernel websocket is not open");
    }
    this.socket.send(encodeFrame(envelope));
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
    if (this.closed) return;
    this.closed = true;
    this.socket.close();
  }

  private receive(data: string | Uint8Array) {
    const raw = decodeFrame(data);
    if (!raw) {
      this.log.warn(
        { bytes: typeof data === "string" ? data.length : data.byteLength },
        "Dropping malformed kernel frame"
      );
      return;
    }
    for (const handler of [...this.receivers]) {
      handler(raw);
    }
  }

  private disconnect(reason?: Error) {
    if (this.disconnected) return;
    this.disconnected = true;
    for (const handler of [...this.disconnectHandlers]) {
      handler(reason);
    }
  }
}

export interface ConnectWebSocketOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  logger?: Logger;
}

export const connectWebSocket = (
  url: string,
  opts: ConnectWebSocketOptions = {}
): Promise<WebSocketTransport> => {
  return new Promise<WebSocketTransport>((resolve, reject) => {
    const ws = new WebSocket(url, {
      headers: opts.headers,
      handshakeTimeout: opts.timeoutMs,
    });
    const cleanup = () => {
      ws.off("open", onOpen);
      ws.off("error", onError);
    };
    const onOpen = () => {
      cleanup();
      resolve(new WebSocketTransport(adaptWebSocket(ws), { logger: opts.logger }));
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    ws.once("open", onOpen);
    ws.once("error", onError);
  });
};

/** Builds the kernel channels websocket URL for a Jupyter server. */
export const kernelChannelsUrl = (
  baseUrl: string,
  kernelId: string,
  sessionId: string
): string => {
  const url = new URL(baseUrl);
  url.protocol = url.protocol === "https:" ? "wss:" : "ws:";
  const base = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
  url.pathname = `${base}api/kernels/${encodeURIComponent(kernelId)}/channels`;
  url.search = "";
  url.searchParams.set("session_id", sessionId);
  return url.toString();
};

export interface JupyterServerConnectorOptions {
  baseUrl: string;
  token?: string;
  /** Maps a kernel name to the id of a running kernel on the server. */
  resolveKernelId: (kernelName: string) => Promise<string>;
  sessionId?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export const createJupyterServerConnector = (
  opts: JupyterServerConnectorOptions
): KernelConnector => {
  const sessionId = opts.sessionId ?? createMessageId();
  return async (kernelName) => {
    const kernelId = await opts.resolveKernelId(kernelName);
    const url = kernelChannelsUrl(opts.baseUrl, kernelId, sessionId);
    const headers = opts.token
      ? { Authorization: `token ${opts.token}` }
      : undefined;
    const transport = await connectWebSocket(url, {
      headers,
      timeoutMs: opts.timeoutMs,
      logger: opts.logger,
    });
    return { transport, kernelId };
  };
};
