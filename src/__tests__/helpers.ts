import type { Chart, ChartRenderer } from '../rendering/ChartRenderer';
import { Playlist } from '../models/Playlist';
import { createTrack, type Track } from '../models/Track';

export interface RecordedRequest {
  url: URL;
  init?: RequestInit;
}

export type FetchHandler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

export function createFakeFetch(handler: FetchHandler): { fetch: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    const raw = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const url = new URL(raw);
    requests.push({ url, init });
    return handler(url, init);
  };
  return { fetch: fakeFetch, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/html' } });
}

export interface RenderCall {
  fileName: string;
  chart: Chart;
}

export class RecordingRenderer implements ChartRenderer {
  readonly calls: RenderCall[] = [];

  async render(fileName: string, chart: Chart): Promise<string> {
    this.calls.push({ fileName, chart });
    return `/out/${fileName}`;
  }
}

export function track(title: string, artist: string, durationSeconds = 180, album = 'Test Album'): Track {
  return createTrack({ title, artist, album, duration: durationSeconds });
}

export function playlistOf(tag: string, ...tracks: Track[]): Playlist {
  return new Playlist(tracks, tag);
}
