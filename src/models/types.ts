// src/models/types.ts
// What: Shared TypeScript types for course records, documents, chunks, index entries and query DTOs.
// How: Fixed-shape interfaces; metadata fields are enumerated rather than an open map so retrieval
//      results stay compact and checkable.

export interface CourseRecord {
  title: string;
  description: string;
  instructor: string;
  price: string;
  curriculum: string[]; // ordered; empty when the course lists none
  url: string; // natural key
}

export interface CourseMetadata {
  title: string;
  url: string;
  price: string;
  instructor: string;
}

export interface NormalizedDocument {
  text: string;
  metadata: CourseMetadata;
}

export interface Chunk {
  id: string; // `${sourceDocumentId}#${index}`
  text: string;
  metadata: CourseMetadata;
  sourceDocumentId: string;
  index: number;
}

export type EmbeddingVector = number[];

export interface IndexEntry {
  vector: EmbeddingVector;
  chunk: Chunk;
}

export interface SearchHit {
  chunk: Chunk;
  score: number; // cosine similarity in [-1, 1]
}

export interface QueryResult {
  answer: string;
  matches: CourseMetadata[];
}

// Shape consumed by the presentation layer.
export interface SearchResponse {
  'Search Result': string;
  'Similar Courses': CourseMetadata[];
}
