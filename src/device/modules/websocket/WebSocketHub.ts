import { WebSocketClient } from './WebSocketClient';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('ws-hub');

/** Registry of connected WebSocket clients with fan-out broadcast. */
export class WebSocketHub {
  private clients: Map<string, WebSocketClient> = new Map();

  get clientCount(): number {
    return this.clients.size;
  }

  add(client: WebSocketClient): void {
    this.clients.set(client.id, client);
    logger.info(`Client ${client.id} connected (${this.clients.size} total)`);
  }

  remove(clientId: string): void {
    if (this.clients.delete(clientId)) {
      logger.info(`Client ${clientId} disconnected (${this.clients.size} total)`);
    }
  }

  /**
   * Sends one text frame to every client. Iterates over a snapshot so
   * clients may join or leave mid-broadcast; a failed send is logged and
   * the client is left for its own close handler to remove.
   */
  broadcast(payload: unknown): number {
    const text = typeof payload === 'string' ? payload : JSON.stringify(payload);
    const snapshot = Array.from(this.clients.values());
    let sent = 0;

    for (const client of snapshot) {
      if (!client.isOpen) continue;
      try {
        client.send(text, error => {
          logger.warn(`Send to client ${client.id} failed: ${error.message}`);
        });
        sent++;
      } catch (error) {
        logger.error(`Error broadcasting to client ${client.id}:`, error);
      }
    }

    return sent;
  }

  closeAll(): void {
    for (const client of Array.from(this.clients.values())) {
      try {
        client.close(1001, 'Server shutting down');
      } catch (error) {
        logger.debug(`Error closing client ${client.id}:`, error);
      }
    }
    this.clients.clear();
  }
}
