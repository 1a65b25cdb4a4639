import { z } from 'zod';

export const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().optional(),
});

export const meSchema = z.object({
  name: z.string(),
});

export const linkDataSchema = z.object({
  name: z.string(),
  title: z.string(),
  selftext: z.string().default(''),
  author: z.string(),
  created_utc: z.number(),
  stickied: z.boolean().default(false),
});

export const listingSchema = z.object({
  data: z.object({
    after: z.string().nullable(),
    children: z.array(z.object({ kind: z.string(), data: z.unknown() })),
  }),
});

// Write endpoints called with api_type=json report failures inside a 200 body
export const jsonEnvelopeSchema = z.object({
  json: z.object({
    errors: z.array(z.array(z.unknown())).default([]),
    data: z
      .object({
        name: z.string().optional(),
        id: z.string().optional(),
        url: z.string().optional(),
      })
      .optional(),
  }),
});

export const wikiPageSchema = z.object({
  data: z.object({
    content_md: z.string(),
  }),
});
