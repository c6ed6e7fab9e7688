import { describe, expect, it } from 'vitest';
import { ValidationError } from '../src/errors.js';
import { normalize, parseCourseRecord } from '../src/services/normalizer.js';
import { PYTHON_COURSE } from './fakes.js';

describe('normalize', () => {
  it('serializes every field as a labelled line', () => {
    const doc = normalize(PYTHON_COURSE);
    expect(doc.text).toBe(
      [
        'Title: Python for Data Science',
        'Description: Analyse data with pandas and NumPy.',
        'Instructor: Ada Lovelace',
        'Price: Free',
        'Curriculum: Python basics | Pandas',
        'URL: https://courses.example.com/python-data-science',
      ].join('\n'),
    );
  });

  it('is deterministic for the same record', () => {
    expect(normalize(PYTHON_COURSE).text).toBe(normalize({ ...PYTHON_COURSE }).text);
  });

  it('carries exactly title, url, price and instructor as metadata', () => {
    expect(normalize(PYTHON_COURSE).metadata).toEqual({
      title: 'Python for Data Science',
      url: 'https://courses.example.com/python-data-science',
      price: 'Free',
      instructor: 'Ada Lovelace',
    });
  });

  it('joins an empty curriculum to an empty string', () => {
    const doc = normalize({ ...PYTHON_COURSE, curriculum: [] });
    expect(doc.text.split('\n')[4]).toBe('Curriculum: ');
  });

  it('rejects a record with a missing required field', () => {
    const { instructor: _omitted, ...withoutInstructor } = PYTHON_COURSE;
    expect(() => parseCourseRecord(withoutInstructor)).toThrow(ValidationError);
    expect(() => parseCourseRecord(withoutInstructor)).toThrow(/instructor: instructor is required/);
  });

  it('rejects a blank title', () => {
    expect(() => parseCourseRecord({ ...PYTHON_COURSE, title: '  ' })).toThrow(/title must not be blank/);
  });
});

describe('parseCourseRecord', () => {
  it('defaults a missing or null curriculum to an empty list', () => {
    const { curriculum: _omitted, ...withoutCurriculum } = PYTHON_COURSE;
    expect(parseCourseRecord(withoutCurriculum).curriculum).toEqual([]);
    expect(parseCourseRecord({ ...PYTHON_COURSE, curriculum: null }).curriculum).toEqual([]);
  });

  it('drops fields outside the record schema', () => {
    const record = parseCourseRecord({ ...PYTHON_COURSE, thumbnail: 'https://courses.example.com/p.png' });
    expect(Object.keys(record).sort()).toEqual(['curriculum', 'description', 'instructor', 'price', 'title', 'url']);
  });

  it('rejects values that are not objects', () => {
    expect(() => parseCourseRecord('not a course')).toThrow(ValidationError);
  });
});
