import type { EchoTransport } from "../local-echo/echo-session.js";

/** In-process transport: records what was sent and replays scripted output. */
export class ScriptTransport implements EchoTransport {
  readonly sent: Array<string> = [];
  private readonly listeners = new Set<(chunk: string) => void>();

  send(input: string): void {
    this.sent.push(input);
  }

  onOutput(listener: (chunk: string) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(chunk: string): void {
    for (const listener of this.listeners) {
      listener(chunk);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
