import { NextFunction, Request, Response, Router } from 'express';
import { DeviceRegistry } from '../modules/fleet/DeviceRegistry';
import { DiscoveryService } from '../modules/fleet/DiscoveryService';
import { CommandOrchestrator } from '../modules/fleet/CommandOrchestrator';
import { ProfileStore, parseProfileSettings } from '../modules/fleet/ProfileStore';
import { CommandAction, CommandTargets, DebouncedAction, Device, ProfileSettings } from '../modules/fleet/types';
import { ValidationError } from '../../protocol/errors';
import {
  parseCameraSettings,
  parseStreamStart,
  parseVideoSettingsUpdate,
  requireObject
} from '../../protocol/validation';

export interface FleetServices {
  registry: DeviceRegistry;
  discovery: DiscoveryService;
  orchestrator: CommandOrchestrator;
  profiles: ProfileStore;
}

function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') {
    throw new ValidationError(`Missing required string field '${field}'`);
  }
  return value;
}

// Tokens never leave the console
export function toDeviceView(device: Device): Omit<Device, 'token'> & { has_token: boolean } {
  const { token, ...view } = device;
  return { ...view, has_token: token !== '' };
}

export function parseTargets(raw: unknown, field = 'targets'): CommandTargets {
  if (typeof raw === 'string' && raw !== '') return raw;
  if (Array.isArray(raw) && raw.length > 0) {
    return raw.map(entry => {
      if (typeof entry !== 'string') throw new ValidationError(`Field '${field}' must contain device ids`);
      return entry;
    });
  }
  throw new ValidationError(`Field '${field}' must be a device id or a non-empty list of ids`);
}

/** Decodes `{op, payload?}` into a command action. */
export function parseCommandAction(body: Record<string, unknown>): CommandAction {
  const op = requireString(body, 'op');
  switch (op) {
    case 'start-stream':
      return { op, payload: parseStreamStart(body.payload) };
    case 'stop-stream':
    case 'force-keyframe':
      return { op };
    case 'update-camera-settings':
      return { op, payload: parseCameraSettings(body.payload) };
    case 'update-video-settings':
      return { op, payload: parseVideoSettingsUpdate(body.payload) };
    case 'apply-profile':
      return { op, payload: parseProfileSettings(body.payload) };
    default:
      throw new ValidationError(`Unknown op '${op}'`);
  }
}

function parseDebouncedAction(body: Record<string, unknown>): DebouncedAction {
  const action = parseCommandAction(body);
  if (action.op === 'update-camera-settings' || action.op === 'update-video-settings') {
    return action;
  }
  throw new ValidationError(`Op '${action.op}' cannot be debounced`);
}

export function createFleetRouter(services: FleetServices): Router {
  const { registry, discovery, orchestrator, profiles } = services;
  const router = Router();

  // GET /api/devices - all claimed devices after a fresh refresh
  router.get('/devices', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const devices = await registry.refresh();
      res.json({ success: true, devices: devices.map(toDeviceView) });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/devices - claim by address
  router.post('/devices', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = requireObject(req.body);
      const port = body.port;
      if (typeof port !== 'number') throw new ValidationError("Missing required numeric field 'port'");
      const token = typeof body.token === 'string' ? body.token : '';

      const device = await registry.claim(requireString(body, 'host'), port, token);
      res.status(201).json({ success: true, device: toDeviceView(device) });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/devices/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await registry.unclaim(req.params.id);
      res.json({ success: true, message: `Device ${req.params.id} removed` });
    } catch (error) {
      next(error);
    }
  });

  router.put('/devices/:id/alias', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const alias = requireString(requireObject(req.body), 'alias');
      const device = await registry.rename(req.params.id, alias);
      res.json({ success: true, device: toDeviceView(device) });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/discovery - candidates from the latest browse that are not claimed yet
  router.get('/discovery', (req: Request, res: Response) => {
    res.json({ success: true, candidates: discovery.newCandidates() });
  });

  router.post('/discovery/claim', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = requireObject(req.body);
      const token = typeof body.token === 'string' ? body.token : '';
      const device = await discovery.claimCandidate(requireString(body, 'alias'), token);
      res.status(201).json({ success: true, device: toDeviceView(device) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/commands', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = requireObject(req.body);
      const action = parseCommandAction(body);
      const results = await orchestrator.execute({ ...action, targets: parseTargets(body.targets) });
      res.json({ success: results.every(result => result.success), results });
    } catch (error) {
      next(error);
    }
  });

  router.post('/commands/debounced', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = requireObject(req.body);
      const action = parseDebouncedAction(body);
      const results = await orchestrator.queueSettings(parseTargets(body.targets), action);
      res.json({ success: results.every(result => result.success), results });
    } catch (error) {
      next(error);
    }
  });

  router.post('/fleet/start-all', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const results = await orchestrator.startAll();
      res.json({ success: results.every(result => result.success), results });
    } catch (error) {
      next(error);
    }
  });

  router.post('/fleet/stop-all', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const results = await orchestrator.stopAll();
      res.json({ success: results.every(result => result.success), results });
    } catch (error) {
      next(error);
    }
  });

  router.get('/profiles', (req: Request, res: Response) => {
    res.json({ success: true, profiles: profiles.list() });
  });

  router.put('/profiles/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const settings: ProfileSettings = parseProfileSettings(requireObject(req.body));
      const profile = await profiles.save(req.params.name, settings);
      res.json({ success: true, profile });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/profiles/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await profiles.delete(req.params.name);
      res.json({ success: true, message: `Profile ${req.params.name} deleted` });
    } catch (error) {
      next(error);
    }
  });

  router.post('/profiles/:name/apply', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = requireObject(req.body);
      const ids = parseTargets(body.device_ids, 'device_ids');
      const results = await profiles.apply(req.params.name, typeof ids === 'string' ? [ids] : ids);
      res.json({ success: results.every(result => result.success), results });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
