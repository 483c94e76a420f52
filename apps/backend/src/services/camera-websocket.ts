/**
 * WebSocket Camera Events
 *
 * Push camera manager events to connected clients via WebSocket.
 * Events: session:opened, session:reinitialized, session:failed,
 *         session:closed, timelapse:started|captured|stopped,
 *         recording:started|stopped, capture:photo
 */

import type { Server } from "http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { nanoid } from "nanoid";
import { API_ENDPOINTS } from "@camstation/config";
import { createLogger } from "@camstation/utils";
import type { CameraEvent, CameraEventType } from "@camstation/types";
import type { CameraManager } from "../camera/camera-manager";

const logger = createLogger("ws-camera");

export const BROADCAST_EVENTS: CameraEventType[] = [
  "session:opened",
  "session:reinitialized",
  "session:failed",
  "session:closed",
  "timelapse:started",
  "timelapse:captured",
  "timelapse:stopped",
  "recording:started",
  "recording:stopped",
  "capture:photo",
];

interface WSClient {
  ws: WebSocket;
  id: string;
  subscriptions: Set<string>;
}

type ClientMessage =
  | { action: "subscribe" | "unsubscribe"; events: string[] }
  | { action: "getStatus" };

function parseClientMessage(data: RawData): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data.toString());
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("action" in parsed)) {
    return null;
  }

  const { action } = parsed;
  if (action === "getStatus") {
    return { action };
  }
  if ((action === "subscribe" || action === "unsubscribe") && "events" in parsed) {
    const { events } = parsed;
    if (Array.isArray(events)) {
      return {
        action,
        events: events.filter((e): e is string => typeof e === "string"),
      };
    }
  }
  return null;
}

function toEventData(payload: unknown): Record<string, unknown> {
  if (typeof payload === "object" && payload !== null && !Array.isArray(payload)) {
    return { ...payload };
  }
  return { value: payload };
}

export class CameraWebSocketServer {
  private wss: WebSocketServer;
  private clients: Map<string, WSClient> = new Map();
  private detachManager: () => void;

  constructor(
    server: Server,
    private readonly manager: CameraManager,
  ) {
    this.wss = new WebSocketServer({ server, path: API_ENDPOINTS.WS_CAMERA });
    this.wss.on("connection", (ws: WebSocket) => this.handleConnection(ws));
    this.detachManager = this.listen();
    logger.info(`WebSocket: Camera events server initialized on ${API_ENDPOINTS.WS_CAMERA}`);
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /**
   * Broadcast event to all subscribed clients
   */
  broadcast(event: CameraEvent): void {
    for (const client of this.clients.values()) {
      // No subscriptions means everything
      if (client.subscriptions.size === 0 || client.subscriptions.has(event.event)) {
        this.sendToClient(client, event);
      }
    }
  }

  close(): Promise<void> {
    this.detachManager();
    for (const client of this.clients.values()) {
      client.ws.close();
    }
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private listen(): () => void {
    const handlers = BROADCAST_EVENTS.map((event) => {
      const handler = (payload: unknown): void => {
        this.broadcast({
          event,
          data: toEventData(payload),
          timestamp: new Date().toISOString(),
        });
      };
      this.manager.on(event, handler);
      return { event, handler };
    });
    return () => {
      for (const { event, handler } of handlers) {
        this.manager.off(event, handler);
      }
    };
  }

  private handleConnection(ws: WebSocket): void {
    const client: WSClient = { ws, id: nanoid(10), subscriptions: new Set() };
    this.clients.set(client.id, client);
    logger.info(`WebSocket: Client ${client.id} connected (${this.clients.size} total)`);

    this.sendStatus(client);

    ws.on("message", (data: RawData) => {
      const message = parseClientMessage(data);
      if (!message) {
        logger.warn(`WebSocket: Invalid message from client ${client.id}`);
        return;
      }
      this.handleClientMessage(client, message);
    });

    ws.on("close", () => {
      this.clients.delete(client.id);
      logger.info(
        `WebSocket: Client ${client.id} disconnected (${this.clients.size} remaining)`,
      );
    });

    ws.on("error", (error) => {
      logger.error(`WebSocket: Client ${client.id} error`, { error: error.message });
      this.clients.delete(client.id);
    });
  }

  private handleClientMessage(client: WSClient, message: ClientMessage): void {
    switch (message.action) {
      case "subscribe":
        message.events.forEach((event) => client.subscriptions.add(event));
        logger.debug(
          `WebSocket: Client ${client.id} subscribed to ${message.events.join(", ")}`,
        );
        break;

      case "unsubscribe":
        message.events.forEach((event) => client.subscriptions.delete(event));
        break;

      case "getStatus":
        this.sendStatus(client);
        break;
    }
  }

  private sendStatus(client: WSClient): void {
    client.ws.send(
      JSON.stringify({
        event: "camera:status",
        data: this.manager.getStatus(),
        timestamp: new Date().toISOString(),
      }),
    );
  }

  private sendToClient(client: WSClient, event: CameraEvent): void {
    if (client.ws.readyState !== WebSocket.OPEN) {
      return;
    }
    client.ws.send(JSON.stringify(event), (error) => {
      if (error) {
        logger.error(`WebSocket: Error sending to client ${client.id}`, {
          error: error.message,
        });
      }
    });
  }
}
