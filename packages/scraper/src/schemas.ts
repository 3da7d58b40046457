import { z } from "zod";

export const steamMovieSchema = z
  .object({
    id: z.number(),
    name: z.string().optional(),
    thumbnail: z.string().optional(),
    dash_h264: z.string().optional(),
    dash_av1: z.string().optional(),
    hls_h264: z.string().optional(),
    highlight: z.boolean().optional(),
  })
  .passthrough();

export const steamAppDataSchema = z
  .object({
    steam_appid: z.number().optional(),
    name: z.string().optional(),
    header_image: z.string().optional(),
    movies: z.array(steamMovieSchema).optional(),
  })
  .passthrough();

export const appDetailsEntrySchema = z.object({
  success: z.boolean(),
  data: steamAppDataSchema.optional(),
});

/** `GET /api/appdetails?appids=<id>` answers with an object keyed by the requested ID. */
export const appDetailsResponseSchema = z.record(z.string(), appDetailsEntrySchema);

export const gameMetadataSchema = z.object({
  appid: z.number().int().positive(),
  name: z.string().min(1),
  storeUrl: z.string().url(),
  headerImage: z.string(),
  manifestUrl: z.string().min(1).optional(),
});
