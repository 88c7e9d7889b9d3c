/**
 * MCP transport for Next.js App Router SSE endpoints.
 *
 * The SDK's SSEServerTransport needs Node's IncomingMessage/ServerResponse,
 * which route handlers don't have. This one writes server→client messages
 * as SSE events on a ReadableStream and takes client→server messages from
 * the POST endpoint via handlePostMessage().
 */
import type { Transport, TransportSendOptions } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";
import { v4 as uuidv4 } from "uuid";
import { errorMessage } from "@/lib/search/errors";

export class NextSSETransport implements Transport {
  readonly sessionId: string;

  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  private readonly encoder = new TextEncoder();
  private readonly queue: JSONRPCMessage[] = [];
  private closed = false;

  constructor(
    private readonly controller: ReadableStreamDefaultController<Uint8Array>,
    private readonly messagesEndpoint: string
  ) {
    this.sessionId = uuidv4();
  }

  /** Tell the client where to POST its messages. */
  async start(): Promise<void> {
    this.sendEvent("endpoint", `${this.messagesEndpoint}?sessionId=${this.sessionId}`);
  }

  async send(message: JSONRPCMessage, _options?: TransportSendOptions): Promise<void> {
    this.sendEvent("message", JSON.stringify(message));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      this.controller.close();
    } catch (err) {
      console.warn(`[mcp] session ${this.sessionId} stream already closed:`, errorMessage(err));
    }
    this.onclose?.();
  }

  handlePostMessage(message: JSONRPCMessage): void {
    if (this.closed) return;
    if (this.onmessage) {
      this.onmessage(message);
    } else {
      this.queue.push(message);
    }
  }

  /** Deliver messages that arrived before connect() set onmessage. */
  flushQueue(): void {
    while (this.onmessage && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next) this.onmessage(next);
    }
  }

  sendKeepAlive(): void {
    this.enqueue(": keepalive\n\n");
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private sendEvent(event: string, data: string): void {
    this.enqueue(`event: ${event}\ndata: ${data}\n\n`);
  }

  private enqueue(chunk: string): void {
    if (this.closed) return;
    try {
      this.controller.enqueue(this.encoder.encode(chunk));
    } catch (err) {
      // the client went away; stop writing to this stream
      this.closed = true;
      this.onerror?.(err instanceof Error ? err : new Error(errorMessage(err)));
    }
  }
}
