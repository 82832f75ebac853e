import type { Endpoint } from "comlink";

/**
 * The part of worker_threads' Worker, MessagePort and parentPort that
 * Comlink needs: EventEmitter-style message delivery.
 */
export interface NodeMessagePort {
  postMessage(value: unknown): void;
  on(event: "message", listener: (value: unknown) => void): unknown;
  off(event: "message", listener: (value: unknown) => void): unknown;
  start?(): void;
}

/**
 * Presents a worker_threads port as a Comlink endpoint. Node delivers the
 * message payload itself; Comlink expects a MessageEvent carrying it in `data`.
 *
 * Transfer lists are not forwarded, so buffers are copied rather than moved.
 */
export function nodeEndpoint(port: NodeMessagePort): Endpoint {
  const listeners = new WeakMap<EventListenerOrEventListenerObject, (value: unknown) => void>();

  return {
    postMessage(message: unknown) {
      port.postMessage(message);
    },
    addEventListener(_type: string, handler: EventListenerOrEventListenerObject) {
      const listener = (data: unknown) => {
        const event = new MessageEvent("message", { data });
        if ("handleEvent" in handler) {
          handler.handleEvent(event);
        } else {
          handler(event);
        }
      };
      port.on("message", listener);
      listeners.set(handler, listener);
    },
    removeEventListener(_type: string, handler: EventListenerOrEventListenerObject) {
      const listener = listeners.get(handler);
      if (!listener) return;
      port.off("message", listener);
      listeners.delete(handler);
    },
    start: port.start?.bind(port),
  };
}
