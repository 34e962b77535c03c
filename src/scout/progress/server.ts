/**
 * Progress server - WebSocket broadcast of progress events
 *
 * Read-only: clients get a hello frame carrying the current state snapshot,
 * then one event frame per progress event. The only requests are
 * `snapshot` and `ping`.
 */

import { createServer, type Server, type IncomingMessage } from "node:http";
import type { AddressInfo } from "node:net";
import { WebSocketServer, WebSocket } from "ws";
import { z } from "zod";
import type { ResolutionSnapshot } from "../orchestrator/state.js";
import type { RunId } from "../runtime/context.js";
import type { ScoutLogger } from "../runtime/logger.js";
import type { ProgressEvent, ProgressReporter } from "./reporter.js";

/** Protocol version for progress clients */
export const PROTOCOL_VERSION = 1;

/** Requests are tiny; anything larger is refused */
const MAX_PAYLOAD_BYTES = 64 * 1024;

/** Heartbeat interval (30s) */
const TICK_INTERVAL_MS = 30_000;

const RequestFrameSchema = z.object({
  type: z.literal("req"),
  id: z.string().min(1),
  method: z.string().min(1),
});

/**
 * Response frame to client
 */
export interface ResponseFrame {
  type: "res";
  id: string;
  ok: boolean;
  payload?: unknown;
  error?: {
    code: string;
    message: string;
  };
}

/**
 * Event frame to client
 */
export interface EventFrame {
  type: "event";
  event: ProgressEvent["type"] | "hello" | "tick";
  payload: unknown;
  seq: number;
}

interface ConnectedClient {
  connectedAt: number;
  eventSeq: number;
}

export interface ProgressServerOptions {
  host: string;
  port: number;
  runId: RunId;
  reporter: ProgressReporter;
  /** Current state for newly connected clients */
  snapshot: () => ResolutionSnapshot | null;
  logger: ScoutLogger;
}

export class ProgressServer {
  private readonly options: ProgressServerOptions;
  private readonly logger: ScoutLogger;

  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private readonly clients = new Map<WebSocket, ConnectedClient>();
  private tickInterval: ReturnType<typeof setInterval> | null = null;
  private unsubscribe: (() => void) | null = null;
  private running = false;

  constructor(options: ProgressServerOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  private send(ws: WebSocket, frame: ResponseFrame | EventFrame): void {
    try {
      ws.send(JSON.stringify(frame));
    } catch (err) {
      this.logger.error("Failed to send progress frame", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private sendResponse(
    ws: WebSocket,
    id: string,
    ok: boolean,
    payload?: unknown,
    error?: { code: string; message: string },
  ): void {
    const frame: ResponseFrame = { type: "res", id, ok };
    if (payload !== undefined) frame.payload = payload;
    if (error) frame.error = error;
    this.send(ws, frame);
  }

  private sendEvent(ws: WebSocket, client: ConnectedClient, event: EventFrame["event"], payload: unknown): void {
    client.eventSeq++;
    this.send(ws, { type: "event", event, payload, seq: client.eventSeq });
  }

  /**
   * Send an event frame to every connected client
   */
  broadcast(event: EventFrame["event"], payload: unknown): void {
    for (const [ws, client] of this.clients) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      this.sendEvent(ws, client, event, payload);
    }
  }

  private handleMessage(ws: WebSocket, data: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      this.sendResponse(ws, "unknown", false, undefined, {
        code: "PARSE_ERROR",
        message: "Invalid JSON",
      });
      return;
    }

    const parsed = RequestFrameSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendResponse(ws, "unknown", false, undefined, {
        code: "INVALID_REQUEST",
        message: "Invalid request frame",
      });
      return;
    }

    const frame = parsed.data;
    switch (frame.method) {
      case "snapshot":
        this.sendResponse(ws, frame.id, true, {
          runId: this.options.runId,
          snapshot: this.options.snapshot(),
        });
        break;

      case "ping":
        this.sendResponse(ws, frame.id, true, { pong: true });
        break;

      default:
        this.sendResponse(ws, frame.id, false, undefined, {
          code: "METHOD_NOT_FOUND",
          message: `Unknown method: ${frame.method}`,
        });
    }
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const client: ConnectedClient = { connectedAt: Date.now(), eventSeq: 0 };
    this.clients.set(ws, client);

    this.logger.debug("Progress client connected", {
      remoteAddress: req.socket.remoteAddress,
    });

    this.sendEvent(ws, client, "hello", {
      protocol: PROTOCOL_VERSION,
      runId: this.options.runId,
      snapshot: this.options.snapshot(),
      methods: ["snapshot", "ping"],
    });

    ws.on("message", (data) => {
      this.handleMessage(ws, data.toString());
    });

    ws.on("close", () => {
      this.clients.delete(ws);
      this.logger.debug("Progress client disconnected");
    });

    ws.on("error", (err) => {
      this.logger.warn("Progress client error", { error: err.message });
    });
  }

  /**
   * Start listening; resolves with the bound address
   */
  async start(): Promise<{ host: string; port: number }> {
    if (this.running) {
      throw new Error("Progress server is already running");
    }

    const httpServer = createServer();
    const wss = new WebSocketServer({ server: httpServer, maxPayload: MAX_PAYLOAD_BYTES });
    this.httpServer = httpServer;
    this.wss = wss;

    wss.on("connection", (ws, req) => {
      this.handleConnection(ws, req);
    });

    await new Promise<void>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(this.options.port, this.options.host, () => {
        httpServer.off("error", reject);
        resolve();
      });
    });

    this.running = true;
    this.unsubscribe = this.options.reporter.subscribe((event) => {
      this.broadcast(event.type, event);
    });
    this.tickInterval = setInterval(() => {
      this.broadcast("tick", { timestamp: Date.now() });
    }, TICK_INTERVAL_MS);

    const address = httpServer.address();
    const port = isAddressInfo(address) ? address.port : this.options.port;
    this.logger.info("Progress server started", { host: this.options.host, port });
    return { host: this.options.host, port };
  }

  /**
   * Stop the server and drop every client
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.unsubscribe?.();
    this.unsubscribe = null;

    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }

    for (const [ws] of this.clients) {
      ws.close(1001, "Server shutting down");
    }
    this.clients.clear();

    if (this.wss) {
      this.wss.close();
      this.wss = null;
    }

    const httpServer = this.httpServer;
    this.httpServer = null;
    if (httpServer) {
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
        httpServer.closeAllConnections();
      });
    }

    this.logger.info("Progress server stopped");
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}
