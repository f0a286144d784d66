import { describe, expect, it } from 'vitest';
import { SlugAllocator, slugify, type ExistingPage } from '../zim/slug.js';

describe('slugify', () => {
  it('should lowercase and join words with underscores', () => {
    expect(slugify('Daily Review')).toBe('daily_review');
    expect(slugify('Meeting notes: Q1/Q2 (draft)')).toBe('meeting_notes_q1_q2_draft');
  });

  it('should fold diacritics and keep other scripts', () => {
    expect(slugify('Café Déjà Vu!')).toBe('cafe_deja_vu');
    expect(slugify('Ünïcödé 日本語')).toBe('unicode_日本語');
  });

  it('should trim separators and fall back to untitled', () => {
    expect(slugify('  --Hello--  ')).toBe('hello');
    expect(slugify('!!!')).toBe('untitled');
    expect(slugify('')).toBe('untitled');
  });
});

describe('SlugAllocator', () => {
  it('should suffix colliding titles in allocation order', () => {
    const allocator = new SlugAllocator({ existing: new Map() });
    expect(allocator.allocate('Daily Review', 'a.md')).toBe('daily_review');
    expect(allocator.allocate('Daily Review', 'b.md')).toBe('daily_review-2');
    expect(allocator.allocate('daily review', 'c.md')).toBe('daily_review-3');
  });

  it('should hand the same slug back to its owner', () => {
    const allocator = new SlugAllocator({ existing: new Map() });
    expect(allocator.allocate('Daily Review', 'a.md')).toBe('daily_review');
    expect(allocator.allocate('Daily Review', 'a.md')).toBe('daily_review');
    expect(allocator.ownerOf('daily_review')).toBe('a.md');
  });

  it('should respect slugs owned by other sources', () => {
    const existing = new Map<string, ExistingPage>([
      ['daily_review', { owner: 'old.md' }],
      ['daily_review-2', { owner: 'new.md' }],
    ]);
    const allocator = new SlugAllocator({ existing });
    expect(allocator.allocate('Daily Review', 'new.md')).toBe('daily_review-2');
    expect(allocator.allocate('Daily Review', 'other.md')).toBe('daily_review-3');
  });

  it('should adopt an unowned page only when its title matches', () => {
    const titles: Record<string, string> = {
      daily_review: 'Something Else',
      'daily_review-2': 'Daily Review',
    };
    const allocator = new SlugAllocator({
      existing: new Map<string, ExistingPage>([
        ['daily_review', {}],
        ['daily_review-2', {}],
      ]),
      readTitle: slug => titles[slug],
    });
    expect(allocator.allocate(' Daily Review ', 'a.md')).toBe('daily_review-2');
    expect(allocator.allocate('Daily Review', 'b.md')).toBe('daily_review-3');
  });
});
