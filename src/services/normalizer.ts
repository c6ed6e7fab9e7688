// src/services/normalizer.ts
// What: Converts raw course records into a single labelled text document plus compact metadata.
// How: parseCourseRecord validates an unknown value with zod (curriculum defaults to []), and
//      normalize serializes the record as one "Label: value" line per field joined with "\n".

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { CourseMetadata, CourseRecord, NormalizedDocument } from '../models/types.js';

export const CURRICULUM_DELIMITER = ' | ';

const nonBlank = (field: string) =>
  z.string({ required_error: `${field} is required` }).refine((s) => s.trim().length > 0, {
    message: `${field} must not be blank`,
  });

export const courseRecordSchema = z.object({
  title: nonBlank('title'),
  description: z.string({ required_error: 'description is required' }),
  instructor: z.string({ required_error: 'instructor is required' }),
  price: z.string({ required_error: 'price is required' }),
  curriculum: z
    .array(z.string())
    .nullish()
    .transform((items) => items ?? []),
  url: nonBlank('url'),
});

export function parseCourseRecord(raw: unknown): CourseRecord {
  const parsed = courseRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.') || 'record'}: ${e.message}`).join('; ');
    throw new ValidationError(`Invalid course record: ${issues}`, parsed.error.issues);
  }
  return parsed.data;
}

export function toMetadata(record: CourseRecord): CourseMetadata {
  return {
    title: record.title,
    url: record.url,
    price: record.price,
    instructor: record.instructor,
  };
}

export function normalize(record: CourseRecord): NormalizedDocument {
  // Re-validate: callers may hand over records that never went through the course source.
  const course = parseCourseRecord(record);
  const text = [
    `Title: ${course.title}`,
    `Description: ${course.description}`,
    `Instructor: ${course.instructor}`,
    `Price: ${course.price}`,
    `Curriculum: ${course.curriculum.join(CURRICULUM_DELIMITER)}`,
    `URL: ${course.url}`,
  ].join('\n');
  return { text, metadata: toMetadata(course) };
}
