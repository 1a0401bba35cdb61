/**
 * Core data types produced by the sentence pipeline and consumed by the PWA
 */

export interface PracticeSentence {
  japanese: string;
  english: string;
  image?: string | null;
}

export interface SentenceGroup {
  subject_id?: number | null;
  word: string;
  reading: string;
  meaning: string;
  level: number;
  sentences: PracticeSentence[];
}

/**
 * The only fields the offline worker reads from the two manifests.
 */
export interface AudioFileReference {
  file: string;
}

export interface SentenceImageReference {
  image?: string | null;
}

export interface ImageReferenceGroup {
  sentences: SentenceImageReference[];
}

export interface AudioManifestEntry extends AudioFileReference {
  word?: string;
  sentence_index?: number;
}

export interface SyncSummary {
  words: number;
  sentences: number;
  destination: string;
}
