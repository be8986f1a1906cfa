import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import {
  CameraSettingsRequest,
  Capability,
  StatusResponse,
  StreamStartRequest,
  SuccessBody,
  VideoSettingsResponse,
  VideoSettingsUpdateRequest
} from '../../../protocol/types';
import { ConnectionError, DeviceResponseError, TimeoutError, errorMessage } from '../../../protocol/errors';
import { isRecord } from '../../../protocol/validation';

/** What the console needs from one device; DeviceClient talks HTTP, tests use fakes. */
export interface DeviceApi {
  getStatus(): Promise<StatusResponse>;
  getCapabilities(): Promise<Capability[]>;
  startStream(request: StreamStartRequest): Promise<void>;
  stopStream(): Promise<void>;
  updateCameraSettings(settings: CameraSettingsRequest): Promise<void>;
  forceKeyframe(): Promise<void>;
  getVideoSettings(): Promise<VideoSettingsResponse>;
  updateVideoSettings(update: VideoSettingsUpdateRequest): Promise<void>;
  setScreenBrightness(dimmed: boolean): Promise<void>;
}

export interface DeviceEndpoint {
  host: string;
  port: number;
  token: string;
}

export type DeviceApiFactory = (endpoint: DeviceEndpoint) => DeviceApi;

export const DEFAULT_CLIENT_TIMEOUT_MS = 5000;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Maps an axios failure onto the three failure kinds the console
 * distinguishes: timeout, unreachable, and a device error reply.
 */
export function mapClientError(error: unknown, target: string, operation: string, timeoutMs: number): Error {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new Error(errorMessage(error));
  }

  if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
    return new TimeoutError(`${operation} on ${target}`, timeoutMs);
  }

  const response = error.response;
  if (!response) {
    return new ConnectionError(target, error.code ?? error.message);
  }

  const body: unknown = response.data;
  if (isRecord(body) && typeof body.code === 'string' && typeof body.message === 'string') {
    return new DeviceResponseError(body.code, response.status, body.message);
  }
  return new DeviceResponseError('HTTP_ERROR', response.status, `${target} answered HTTP ${response.status}`);
}

/** HTTP client for one device's control API. */
export class DeviceClient implements DeviceApi {
  readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(endpoint: DeviceEndpoint, timeoutMs = DEFAULT_CLIENT_TIMEOUT_MS) {
    this.baseUrl = `http://${endpoint.host}:${endpoint.port}`;
    this.timeoutMs = timeoutMs;

    const headers: Record<string, string> = { 'User-Agent': 'camfleet-console/1.0' };
    // Only send Authorization when there is a token
    if (endpoint.token !== '') {
      headers.Authorization = `Bearer ${endpoint.token}`;
    }

    this.http = axios.create({ baseURL: this.baseUrl, timeout: timeoutMs, headers });
  }

  private async request<T>(operation: string, config: AxiosRequestConfig): Promise<T> {
    try {
      const response = await this.http.request<T>(config);
      return response.data;
    } catch (error) {
      throw mapClientError(error, this.baseUrl, operation, this.timeoutMs);
    }
  }

  getStatus(): Promise<StatusResponse> {
    return this.request<StatusResponse>('status', { method: 'GET', url: '/api/v1/status' });
  }

  getCapabilities(): Promise<Capability[]> {
    return this.request<Capability[]>('capabilities', { method: 'GET', url: '/api/v1/capabilities' });
  }

  async startStream(request: StreamStartRequest): Promise<void> {
    await this.request<SuccessBody>('stream start', { method: 'POST', url: '/api/v1/stream/start', data: request });
  }

  async stopStream(): Promise<void> {
    await this.request<SuccessBody>('stream stop', { method: 'POST', url: '/api/v1/stream/stop' });
  }

  async updateCameraSettings(settings: CameraSettingsRequest): Promise<void> {
    await this.request<SuccessBody>('camera update', { method: 'POST', url: '/api/v1/camera', data: settings });
  }

  async forceKeyframe(): Promise<void> {
    await this.request<SuccessBody>('keyframe', { method: 'POST', url: '/api/v1/encoder/force_keyframe' });
  }

  getVideoSettings(): Promise<VideoSettingsResponse> {
    return this.request<VideoSettingsResponse>('video settings', { method: 'GET', url: '/api/v1/video/settings' });
  }

  async updateVideoSettings(update: VideoSettingsUpdateRequest): Promise<void> {
    await this.request<SuccessBody>('video settings update', { method: 'PUT', url: '/api/v1/video/settings', data: update });
  }

  async setScreenBrightness(dimmed: boolean): Promise<void> {
    await this.request<SuccessBody>('screen brightness', { method: 'POST', url: '/api/v1/screen/brightness', data: { dimmed } });
  }
}

export const createDeviceClient = (timeoutMs: number): DeviceApiFactory =>
  endpoint => new DeviceClient(endpoint, timeoutMs);
