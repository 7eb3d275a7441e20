import { z } from 'zod';

export const spotifyTokenSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().int().positive(),
});

const spotifyArtistSchema = z.object({
  name: z.string(),
});

const spotifyTrackSchema = z.object({
  type: z.literal('track'),
  name: z.string(),
  duration_ms: z.number().nonnegative(),
  artists: z.array(spotifyArtistSchema),
  album: z.object({
    name: z.string(),
  }),
});

const spotifyEpisodeSchema = z.object({
  type: z.literal('episode'),
  name: z.string(),
});

export const spotifyPlaylistItemSchema = z.object({
  is_local: z.boolean().optional(),
  track: z.union([spotifyTrackSchema, spotifyEpisodeSchema]).nullable(),
});

export const spotifyPlaylistPageSchema = z.object({
  items: z.array(spotifyPlaylistItemSchema),
  total: z.number().int().nonnegative(),
  offset: z.number().int().nonnegative(),
  limit: z.number().int().nonnegative(),
  next: z.string().nullable(),
});

export type SpotifyToken = z.infer<typeof spotifyTokenSchema>;
export type SpotifyTrack = z.infer<typeof spotifyTrackSchema>;
export type SpotifyPlaylistItem = z.infer<typeof spotifyPlaylistItemSchema>;
export type SpotifyPlaylistPage = z.infer<typeof spotifyPlaylistPageSchema>;
