import { describe, it, expect } from 'vitest';
import { findSectionBoundaries, previewLine } from '../scan.js';
import { DEFAULT_LAYOUT } from '../layout.js';
import { memorySource, pagesWith } from './fixtures.js';

describe('findSectionBoundaries', () => {
  it('finds every catalog title placed verbatim after the fixed block', async () => {
    const titles = DEFAULT_LAYOUT.detected;
    const pages = pagesWith(25, {
      17: 'Data Management and Sharing Plan',
      18: 'Mentoring Plan',
      20: 'Project Personnel and Partner Organizations',
      22: 'Facilities, Equipment and Other Resources',
      24: 'Synergistic Activities',
    });

    const { boundaries } = await findSectionBoundaries(memorySource(pages), { startPage: 16, titles });

    expect(Object.fromEntries(boundaries)).toEqual({
      'Data Management and Sharing Plan': 17,
      'Mentoring Plan': 18,
      'Project Personnel and Partner Organizations': 20,
      'Facilities, Equipment and Other Resources': 22,
      'Synergistic Activities': 24,
    });
  });

  it('keeps the first qualifying page even when a later line matches better', async () => {
    const pages = pagesWith(6, {
      1: 'Mentoring Plan 2',
      4: 'Mentoring Plan',
    });

    const { boundaries, matches } = await findSectionBoundaries(memorySource(pages), {
      startPage: 0,
      titles: ['Mentoring Plan'],
    });

    expect(boundaries.get('Mentoring Plan')).toBe(1);
    expect(matches).toHaveLength(1);
  });

  it('lets only the first qualifying title claim a line', async () => {
    const pages = ['Mentoring Plan', 'Mentoring Plan'];

    const { boundaries } = await findSectionBoundaries(memorySource(pages), {
      startPage: 0,
      titles: ['Mentoring Plan', 'Mentoring Plans'],
    });

    expect(boundaries.get('Mentoring Plan')).toBe(0);
    expect(boundaries.get('Mentoring Plans')).toBe(1);
  });

  it('never matches lines shorter than five characters', async () => {
    const pages = ['Plan', '  Plan  \nplan', 'Plans'];

    const { boundaries } = await findSectionBoundaries(memorySource(pages), {
      startPage: 0,
      titles: ['Plan'],
    });

    // "plans" (5 chars) scores 2·4/9 ≈ 0.89 against "plan"
    expect(boundaries.get('Plan')).toBe(2);
  });

  it('measures line length in characters, not UTF-16 units', async () => {
    // three astral characters: six code units
    const { boundaries } = await findSectionBoundaries(memorySource(['\u{1D400}\u{1D401}\u{1D402}']), {
      startPage: 0,
      titles: ['\u{1D400}\u{1D401}\u{1D402}'],
    });

    expect(boundaries.size).toBe(0);
  });

  it('accepts a score exactly at the threshold', async () => {
    const pages = ['page 18 references cited'];
    const source = memorySource(pages);

    const atThreshold = await findSectionBoundaries(source, {
      startPage: 0,
      titles: ['References Cited'],
      threshold: 0.8,
    });
    const aboveThreshold = await findSectionBoundaries(source, {
      startPage: 0,
      titles: ['References Cited'],
      threshold: 0.81,
    });

    expect(atThreshold.boundaries.get('References Cited')).toBe(0);
    expect(aboveThreshold.boundaries.size).toBe(0);
  });

  it('compares lowercased, trimmed lines', async () => {
    const pages = ['Intro\n   REFERENCES CITED   \nMore text'];

    const { matches } = await findSectionBoundaries(memorySource(pages), {
      startPage: 0,
      titles: ['References Cited'],
    });

    expect(matches).toEqual([
      { title: 'References Cited', page: 0, line: '   REFERENCES CITED   ', score: 1 },
    ]);
  });

  it('ignores pages before the start page', async () => {
    const pages = pagesWith(5, { 2: 'Synergistic Activities' });
    const source = memorySource(pages);

    const { boundaries } = await findSectionBoundaries(source, {
      startPage: 3,
      titles: ['Synergistic Activities'],
    });

    expect(boundaries.size).toBe(0);
    expect(source.reads).toEqual([3, 4]);
  });

  it('stops reading pages once every title is found', async () => {
    const pages = pagesWith(10, { 1: 'Mentoring Plan\nSynergistic Activities' });
    const source = memorySource(pages);

    const { boundaries } = await findSectionBoundaries(source, {
      startPage: 0,
      titles: ['Synergistic Activities', 'Mentoring Plan'],
    });

    expect(Object.fromEntries(boundaries)).toEqual({
      'Mentoring Plan': 1,
      'Synergistic Activities': 1,
    });
    expect(source.reads).toEqual([0, 1]);
  });

  it('treats empty pages as having no match', async () => {
    const pages = ['', '', 'Mentoring Plan'];

    const { boundaries } = await findSectionBoundaries(memorySource(pages), {
      startPage: 0,
      titles: ['Mentoring Plan', 'Synergistic Activities'],
    });

    expect(Object.fromEntries(boundaries)).toEqual({ 'Mentoring Plan': 2 });
  });

  it('reports each hit to the logger', async () => {
    const messages: string[] = [];
    const pages = pagesWith(3, { 2: 'Mentoring Plan' });

    await findSectionBoundaries(memorySource(pages), {
      startPage: 0,
      titles: ['Mentoring Plan'],
      logger: { info: (message) => messages.push(message) },
    });

    expect(messages).toEqual([
      "Found 'Mentoring Plan' on page 3 (match: 'Mentoring Plan' with score 1.00)",
    ]);
  });
});

describe('previewLine', () => {
  it('trims the line', () => {
    expect(previewLine('  Mentoring Plan  ')).toBe('Mentoring Plan');
  });

  it('cuts long lines to 60 characters', () => {
    expect(previewLine('x'.repeat(61))).toBe(`${'x'.repeat(60)}...`);
    expect(previewLine('x'.repeat(60))).toBe('x'.repeat(60));
  });
});
