import type { TurnEvent } from "../events/events.js";

export interface SSEMessage {
  event: string;
  data: string;
  id?: string;
}

export interface SSEWriter {
  writeSSE(message: SSEMessage): Promise<void>;
  close(): void;
  /** True once the client went away or the stream was closed */
  readonly closed: boolean;
}

export function formatSSE({ event, data, id }: SSEMessage): string {
  let message = "";
  if (id) message += `id: ${id}\n`;
  message += `event: ${event}\n`;
  for (const line of data.split("\n")) message += `data: ${line}\n`;
  return `${message}\n`;
}

/**
 * Creates a web-standard Response with SSE content.
 * The handler receives an SSEWriter to write events.
 * Returns a Response with Content-Type: text/event-stream.
 */
export function createSSEStream(
  handler: (writer: SSEWriter) => Promise<void>,
  signal?: AbortSignal,
): Response {
  let controller: ReadableStreamDefaultController<Uint8Array> | undefined;
  let closed = false;
  const encoder = new TextEncoder();

  const stream = new ReadableStream<Uint8Array>({
    start(ctrl) {
      controller = ctrl;
    },
    cancel() {
      closed = true;
    },
  });

  const writer: SSEWriter = {
    async writeSSE(message) {
      if (closed || !controller) return;
      controller.enqueue(encoder.encode(formatSSE(message)));
    },
    close() {
      if (closed) return;
      closed = true;
      controller?.close();
    },
    get closed() {
      return closed;
    },
  };

  handler(writer)
    .catch((err: unknown) => console.error("[sse] Stream handler failed:", err))
    .finally(() => writer.close());

  if (signal) {
    signal.addEventListener("abort", () => writer.close(), { once: true });
  }

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
}

/**
 * Streams a turn as SSE: the event name is the event's `type`, the data its
 * JSON. Stops pulling events once the client disconnects, which also ends the
 * turn's generator.
 */
export function streamTurnEvents(events: AsyncIterable<TurnEvent>, signal?: AbortSignal): Response {
  return createSSEStream(async (writer) => {
    let id = 0;
    for await (const event of events) {
      if (writer.closed) break;
      await writer.writeSSE({ id: String(id++), event: event.type, data: JSON.stringify(event) });
    }
  }, signal);
}
