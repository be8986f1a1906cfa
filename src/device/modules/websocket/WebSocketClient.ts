import WebSocket from 'ws';
import { v4 as uuidv4 } from 'uuid';

/** One connected WebSocket peer, identified by a generated id. */
export class WebSocketClient {
  readonly id: string;

  constructor(private readonly socket: WebSocket, id: string = uuidv4()) {
    this.id = id;
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  /** Queues a text frame; write errors arrive through `onError`. */
  send(text: string, onError: (error: Error) => void): void {
    this.socket.send(text, error => {
      if (error) onError(error);
    });
  }

  close(code = 1000, reason = ''): void {
    this.socket.close(code, reason);
  }
}
