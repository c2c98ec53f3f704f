import { z } from 'zod';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const calendarDateSchema = z
  .string()
  .regex(ISO_DATE, 'expected a YYYY-MM-DD date')
  .refine(value => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'not a calendar date');

export const singleSongInputSchema = z.object({
  title: z.string(),
  genres: z.array(z.string()),
  artist: z.string(),
  releaseDate: calendarDateSchema,
});

export const albumInputSchema = z.object({
  title: z.string(),
  genre: z.string(),
  artist: z.string(),
  releaseDate: calendarDateSchema,
  songs: z.array(z.string()),
});

export const usernameSchema = z.string();

// No 1..5 range here: the use case checks it after the user and song lookups
export const songRatingInputSchema = z.object({
  username: z.string(),
  artist: z.string(),
  songTitle: z.string(),
  rating: z.number().int(),
  ratedOn: calendarDateSchema,
});

export function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'item'}: ${issue.message}`).join('; ');
}
