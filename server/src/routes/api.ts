import type {
  ApiErrorResponse,
  DiagnosticsResponse,
  ErrorCode,
  FeedDiagnostics,
  HealthResponse,
  MetadataResponse,
} from '@nowplaying-bridge/protocol';
import type { NowPlaying, PlaybackStore } from '../lib/playback-store.js';

/**
 * What the routes read from. The feed is only consulted for diagnostics,
 * never for metadata or health.
 */
export interface ApiDeps {
  store: Pick<PlaybackStore, 'snapshot'>;
  feed: { getDiagnostics(): FeedDiagnostics };
}

type RouteHandler = (deps: ApiDeps) => Response;

export function corsHeaders(origin?: string | null): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': origin || '*',
    'Access-Control-Allow-Methods': 'GET, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
  };
}

export function jsonResponse<T>(data: T, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      'Content-Type': 'application/json',
      'Cache-Control': 'no-store',
      ...headers,
    },
  });
}

export function errorResponse(
  error: ErrorCode,
  message: string,
  status: number,
  headers: Record<string, string> = {},
): Response {
  const body: ApiErrorResponse = { error, message };
  return jsonResponse(body, status, headers);
}

/**
 * Encodes a snapshot in its wire form. Artwork becomes base64 here, not in the store.
 * @param snapshot - The current playback record
 * @returns The `GET /metadata` body
 */
export function toMetadataResponse(snapshot: NowPlaying): MetadataResponse {
  const { artwork } = snapshot;
  return {
    title: snapshot.title,
    artist: snapshot.artist,
    album: snapshot.album,
    genre: snapshot.genre,
    artwork_base64: artwork
      ? Buffer.from(artwork.buffer, artwork.byteOffset, artwork.byteLength).toString('base64')
      : null,
    is_playing: snapshot.isPlaying,
    player_state: snapshot.playerState,
    volume: snapshot.volume,
    client_name: snapshot.clientName,
  };
}

const routes = new Map<string, RouteHandler>([
  // GET /metadata
  ['/metadata', ({ store }) => jsonResponse(toMetadataResponse(store.snapshot()))],

  // GET /health - independent of feed connectivity
  [
    '/health',
    () => {
      const body: HealthResponse = { status: 'ok' };
      return jsonResponse(body);
    },
  ],

  // GET /diagnostics
  [
    '/diagnostics',
    ({ store, feed }) => {
      const snapshot = store.snapshot();
      const body: DiagnosticsResponse = {
        feed: feed.getDiagnostics(),
        player_state: snapshot.playerState,
        updated_at: snapshot.updatedAt,
      };
      return jsonResponse(body);
    },
  ],
]);

export function handleApiRoutes(req: Request, url: URL, deps: ApiDeps): Response {
  const cors = corsHeaders(req.headers.get('Origin'));

  // Handle CORS preflight
  if (req.method === 'OPTIONS') {
    return new Response(null, { status: 204, headers: cors });
  }

  const handler = routes.get(url.pathname);
  if (!handler) {
    return errorResponse('not_found', `No route for ${url.pathname}`, 404, cors);
  }

  if (req.method !== 'GET' && req.method !== 'HEAD') {
    return errorResponse('method_not_allowed', `${req.method} not allowed`, 405, {
      ...cors,
      Allow: 'GET, OPTIONS',
    });
  }

  const response = handler(deps);
  for (const [name, value] of Object.entries(cors)) {
    response.headers.set(name, value);
  }
  return response;
}
