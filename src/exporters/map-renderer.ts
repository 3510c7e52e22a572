// =============================================================================
// MAP RENDERING (EXTERNAL)
// =============================================================================
//
// Pixels are produced by an external static-map service. This module prepares
// the sampled points and bounds the call with a timeout and caller abort.

import { ActivityTrack, GeoPoint } from '../types/app-types';
import { DEFAULT_MAP_RENDER_TIMEOUT_MS, DEFAULT_MAP_SAMPLE_COUNT } from '../core/config';
import { MapRenderError, MapRenderTimeoutError } from '../core/errors';
import { createLogger } from '../utils/logger';
import { sampleForMap } from './map-sampler';

const log = createLogger('map-renderer');

export interface MapRenderRequest {
  points: GeoPoint[];
  width: number;
  height: number;
}

export interface MapRenderer {
  render(request: MapRenderRequest, signal: AbortSignal): Promise<Uint8Array>;
}

export interface RenderMapOptions {
  targetCount?: number;
  width?: number;
  height?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Samples the track and hands the points to the renderer. The track is
 * read-only, so abandoning the call at any point leaves it untouched.
 */
export async function renderActivityMap(
  track: ActivityTrack,
  renderer: MapRenderer,
  options: RenderMapOptions = {},
): Promise<Uint8Array> {
  const points = sampleForMap(track, options.targetCount ?? DEFAULT_MAP_SAMPLE_COUNT);
  const timeoutMs = options.timeoutMs ?? DEFAULT_MAP_RENDER_TIMEOUT_MS;

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new MapRenderTimeoutError(timeoutMs));
  }, timeoutMs);

  const onCallerAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    onCallerAbort();
  } else {
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
  }

  try {
    const aborted = new Promise<never>((_, reject) => {
      const fail = () => reject(controller.signal.reason);
      if (controller.signal.aborted) fail();
      else controller.signal.addEventListener('abort', fail, { once: true });
    });
    return await Promise.race([
      renderer.render({ points, width: options.width ?? 800, height: options.height ?? 600 }, controller.signal),
      aborted,
    ]);
  } catch (error) {
    if (timedOut) {
      log.warn(`Map rendering timed out after ${timeoutMs}ms`);
      throw new MapRenderTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}

export interface HttpMapRendererOptions {
  endpoint: string;
  headers?: Record<string, string>;
}

/**
 * Posts the points as JSON to a static-map service and returns the image bytes.
 */
export class HttpMapRenderer implements MapRenderer {
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;

  constructor(options: HttpMapRendererOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.headers = options.headers ?? {};
  }

  async render(request: MapRenderRequest, signal: AbortSignal): Promise<Uint8Array> {
    const started = Date.now();
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'image/png', ...this.headers },
      body: JSON.stringify(request),
      signal,
    });

    log.debug('render response', {
      endpoint: this.endpoint,
      status: response.status,
      points: request.points.length,
      durationMs: Date.now() - started,
    });

    if (!response.ok) {
      throw new MapRenderError(`Map renderer responded ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    return new Uint8Array(await response.arrayBuffer());
  }
}
