import { CameraControl } from '../camera/types';
import { PathRateLimiter } from '../../middleware/rateLimit';
import { applyCameraSettings } from '../../routes/api';
import { parseWebSocketCommand } from '../../../protocol/validation';
import { errorMessage } from '../../../protocol/errors';
import { createLogger } from '../../../utils/logger';

const logger = createLogger('ws-command');

// `set` is charged against the same limiter class as REST camera updates
const CAMERA_ROUTE = '/api/v1/camera';

export type CommandHandler = (clientId: string, text: string) => Promise<void>;

/**
 * Handles inbound WebSocket text frames. Every failure is logged and the
 * frame dropped; the connection is never closed from here.
 */
export function createCommandHandler(camera: CameraControl, limiter: PathRateLimiter): CommandHandler {
  return async (clientId, text) => {
    try {
      const command = parseWebSocketCommand(text);

      if (command.op !== 'set' || command.camera === undefined) {
        logger.warn(`Ignoring op '${command.op}' from client ${clientId}`);
        return;
      }

      limiter.check(CAMERA_ROUTE);
      await applyCameraSettings(camera, command.camera);
      logger.debug(`Applied camera settings from client ${clientId}`);
    } catch (error) {
      logger.warn(`Dropped command from client ${clientId}: ${errorMessage(error)}`);
    }
  };
}
