import { NextFunction, Request, Response, Router } from 'express';
import { CameraControl } from '../modules/camera/types';
import {
  EncodingError,
  NotImplementedError,
  UpstreamError,
  ValidationError,
  errorMessage
} from '../../protocol/errors';
import {
  parseAliasUpdate,
  parseCameraSettings,
  parseScreenBrightness,
  parseStreamStart,
  parseTorchLevel,
  parseVideoSettingsUpdate
} from '../../protocol/validation';
import { CameraSettingsRequest, SuccessBody } from '../../protocol/types';
import { createLogger } from '../../utils/logger';

const logger = createLogger('api');

/** Serializes the payload up front so an encoding failure becomes ENCODING_FAILED. */
export function sendJson(res: Response, payload: unknown, status = 200): void {
  let text: string | undefined;
  try {
    text = JSON.stringify(payload);
  } catch (error) {
    throw new EncodingError(errorMessage(error));
  }
  if (text === undefined) {
    throw new EncodingError('payload is not serializable');
  }
  res.status(status).type('application/json').send(text);
}

function success(message: string): SuccessBody {
  return { success: true, message };
}

// express.json leaves `{}` behind when nothing was sent, so look at the framing headers
function requireBody(req: Request): unknown {
  const length = Number(req.headers['content-length'] ?? 0);
  if (length <= 0 && req.headers['transfer-encoding'] === undefined) {
    throw ValidationError.missingBody();
  }
  return req.body;
}

async function invoke<T>(code: string, label: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new UpstreamError(code, `${label} failed: ${errorMessage(error)}`);
  }
}

/** Shared by `POST /api/v1/camera` and the WebSocket `set` command. */
export function applyCameraSettings(camera: CameraControl, settings: CameraSettingsRequest): Promise<void> {
  return invoke('CAMERA_UPDATE_FAILED', 'Camera update', () => camera.updateCameraSettings(settings));
}

export function createApiRouter(camera: CameraControl): Router {
  // Literal paths only; no parameters, no trailing-slash or case folding
  const router = Router({ caseSensitive: true, strict: true });

  router.get('/api/v1/status', (req: Request, res: Response, next: NextFunction) => {
    try {
      sendJson(res, camera.getStatus());
    } catch (error) {
      next(error);
    }
  });

  router.get('/api/v1/capabilities', (req: Request, res: Response, next: NextFunction) => {
    try {
      sendJson(res, camera.getCapabilities());
    } catch (error) {
      next(error);
    }
  });

  router.post('/api/v1/stream/start', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const config = parseStreamStart(requireBody(req));
      await invoke('STREAM_START_FAILED', 'Stream start', () => camera.startStream(config));
      sendJson(res, success('Stream started'));
    } catch (error) {
      next(error);
    }
  });

  router.post('/api/v1/stream/stop', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await invoke('STREAM_STOP_FAILED', 'Stream stop', () => camera.stopStream());
      sendJson(res, success('Stream stopped'));
    } catch (error) {
      next(error);
    }
  });

  router.post('/api/v1/camera', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const settings = parseCameraSettings(requireBody(req));
      await applyCameraSettings(camera, settings);
      sendJson(res, success('Camera settings updated'));
    } catch (error) {
      next(error);
    }
  });

  router.post('/api/v1/encoder/force_keyframe', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await invoke('KEYFRAME_FAILED', 'Keyframe', () => camera.forceKeyframe());
      sendJson(res, success('Keyframe requested'));
    } catch (error) {
      next(error);
    }
  });

  router.get('/api/v1/video/settings', (req: Request, res: Response, next: NextFunction) => {
    try {
      sendJson(res, camera.getVideoSettings());
    } catch (error) {
      next(error);
    }
  });

  router.put('/api/v1/video/settings', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const update = parseVideoSettingsUpdate(requireBody(req));
      await invoke('VIDEO_SETTINGS_UPDATE_FAILED', 'Video settings update', () => camera.updateVideoSettings(update));
      sendJson(res, success('Video settings updated'));
    } catch (error) {
      next(error);
    }
  });

  router.post('/api/v1/screen/brightness', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { dimmed } = parseScreenBrightness(requireBody(req));
      await invoke('SCREEN_BRIGHTNESS_FAILED', 'Screen brightness', () => camera.setScreenBrightness(dimmed));
      sendJson(res, success('Screen brightness updated'));
    } catch (error) {
      next(error);
    }
  });

  router.put('/api/v1/settings/alias', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { alias } = parseAliasUpdate(requireBody(req));
      await invoke('ALIAS_UPDATE_FAILED', 'Alias update', () => camera.updateAlias(alias));
      sendJson(res, { alias });
    } catch (error) {
      next(error);
    }
  });

  router.get('/api/v1/torch/level', (req: Request, res: Response, next: NextFunction) => {
    try {
      sendJson(res, camera.getTorchLevel());
    } catch (error) {
      next(error);
    }
  });

  router.put('/api/v1/torch/level', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { level } = parseTorchLevel(requireBody(req));
      await invoke('TORCH_UPDATE_FAILED', 'Torch update', () => camera.setTorchLevel(level));
      sendJson(res, camera.getTorchLevel());
    } catch (error) {
      next(error);
    }
  });

  router.post('/api/v1/camera/wb/measure', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const measurement = await invoke('MEASURE_FAILED', 'White balance measurement', () =>
        camera.measureWhiteBalance()
      );
      sendJson(res, measurement);
    } catch (error) {
      next(error);
    }
  });

  // TODO: bundle the rotated files under logs/ once LOG_TO_FILE rotation exists
  router.get('/api/v1/logs.zip', (req: Request, res: Response, next: NextFunction) => {
    logger.debug('Logs download requested');
    next(new NotImplementedError('Logs download'));
  });

  return router;
}
