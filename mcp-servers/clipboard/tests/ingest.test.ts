import { describe, it, expect } from 'vitest';
import { IngestionFilter } from '../src/ingest';
import { at } from './helpers';

describe('IngestionFilter', () => {
  it('accepts new text and stamps it with the observation time', () => {
    const filter = new IngestionFilter();
    const entry = filter.observe('hello', at(7));

    expect(entry).not.toBeNull();
    expect(entry?.text).toBe('hello');
    expect(entry?.capturedAt).toEqual(at(7));
  });

  it('accepts the first of two identical observations and rejects the second', () => {
    const filter = new IngestionFilter();
    expect(filter.observe('same', at(1))).not.toBeNull();
    expect(filter.observe('same', at(2))).toBeNull();
  });

  it('rejects empty and whitespace-only values without updating state', () => {
    const filter = new IngestionFilter();
    filter.observe('real', at(1));

    expect(filter.observe('')).toBeNull();
    expect(filter.observe('   ')).toBeNull();
    expect(filter.observe('\n\t ')).toBeNull();
    expect(filter.observe('real', at(2))).toBeNull();
  });

  it('keeps surrounding whitespace of accepted text', () => {
    const filter = new IngestionFilter();
    expect(filter.observe('  padded \n', at(1))?.text).toBe('  padded \n');
  });

  it('accepts a value again once something else was accepted in between', () => {
    const filter = new IngestionFilter();
    filter.observe('a', at(1));
    filter.observe('b', at(2));
    expect(filter.observe('a', at(3))?.capturedAt).toEqual(at(3));
  });

  it('compares text exactly, including case', () => {
    const filter = new IngestionFilter();
    filter.observe('Case', at(1));
    expect(filter.observe('case', at(2))).not.toBeNull();
  });
});
