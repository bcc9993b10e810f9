// Spotify Web API payloads (subset)
// https://developer.spotify.com/documentation/web-api/reference/get-the-users-currently-playing-track

import { z } from 'zod';

export const ArtistCodec = z.object({
  name: z.string(),
  id: z.string(),
});
export type Artist = z.infer<typeof ArtistCodec>;

export const AlbumCodec = z.object({
  name: z.string(),
  id: z.string(),
  total_tracks: z.number().int(),
  release_date: z.string(),
  album_type: z.string(),
  artists: z.array(ArtistCodec),
});
export type Album = z.infer<typeof AlbumCodec>;

export const ExternalIdsCodec = z.object({
  isrc: z.string().optional(),
  ean: z.string().optional(),
  upc: z.string().optional(),
});
export type ExternalIds = z.infer<typeof ExternalIdsCodec>;

export const TrackCodec = z.object({
  name: z.string(),
  id: z.string(),
  album: AlbumCodec,
  artists: z.array(ArtistCodec),
  disc_number: z.number().int(),
  duration_ms: z.number().int(),
  external_ids: ExternalIdsCodec,
  explicit: z.boolean(),
});
export type Track = z.infer<typeof TrackCodec>;

// The item is only partially parsed: episodes and ads share the field
export const CurrentlyPlayingCodec = z.object({
  timestamp: z.number(),
  progress_ms: z.number().nullable().optional(),
  currently_playing_type: z.string(),
  is_playing: z.boolean(),
  item: z.unknown().optional(),
});
export type CurrentlyPlayingTrack = z.infer<typeof CurrentlyPlayingCodec>;
