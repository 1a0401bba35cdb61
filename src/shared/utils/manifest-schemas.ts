/**
 * Zod schemas for the JSON files the pipeline writes next to the PWA
 */

import { z } from 'zod';
import { AudioFileReference, ImageReferenceGroup, SentenceGroup } from '../types/core.js';

// The worker only needs `file`; other generator fields are stripped unchecked
export const AudioManifestSchema: z.ZodType<AudioFileReference[], z.ZodTypeDef, unknown> =
  z.array(z.object({
    file: z.string().min(1, "Audio file name cannot be empty")
  }));

/**
 * Image discovery view of sentences.json. Groups and sentences may omit every
 * field but the ones read here.
 */
export const SentenceImagesSchema: z.ZodType<ImageReferenceGroup[], z.ZodTypeDef, unknown> =
  z.array(z.object({
    sentences: z.array(z.object({ image: z.string().nullish() }))
      .nullish()
      .transform(sentences => sentences ?? [])
  }));

const PracticeSentenceSchema = z.object({
  japanese: z.string(),
  english: z.string(),
  image: z.string().nullish()
});

const SentenceGroupSchema = z.object({
  subject_id: z.number().int().nullish(),
  word: z.string().min(1, "Word cannot be empty"),
  reading: z.string(),
  meaning: z.string(),
  level: z.number().int(),
  sentences: z.array(PracticeSentenceSchema).default([])
});

// Full record shape, enforced when syncing data into the PWA
export const SentenceDataSchema: z.ZodType<SentenceGroup[], z.ZodTypeDef, unknown> =
  z.array(SentenceGroupSchema);

/**
 * Flatten zod issues into a single line for logs and error messages.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}
