import { describe, expect, it } from 'vitest';
import { headingKey, parseHeading, removeDuplicateHeading } from '../zim/headings.js';

describe('parseHeading', () => {
  it('should return the text of Zim headings', () => {
    expect(parseHeading('====== Daily Review ======')).toBe('Daily Review');
    expect(parseHeading('  ===== Section =====  ')).toBe('Section');
    expect(parseHeading('== Small ==')).toBe('Small');
  });

  it('should reject other lines', () => {
    expect(parseHeading('plain text')).toBeUndefined();
    expect(parseHeading('= one =')).toBeUndefined();
    expect(parseHeading('====== unbalanced ====')).toBeUndefined();
  });
});

describe('headingKey', () => {
  it('should fold typography, case, underscores and punctuation', () => {
    expect(headingKey('Don’t  Panic!')).toBe('dont panic');
    expect(headingKey('daily_review')).toBe('daily review');
    expect(headingKey('**Café**')).toBe('cafe');
  });
});

describe('removeDuplicateHeading', () => {
  it('should remove a leading heading that repeats the title', () => {
    const body = '====== Daily Review ======\n\nBody\n';
    expect(removeDuplicateHeading(body, 'Daily Review', 'daily-review')).toBe('Body\n');
  });

  it('should match through typographic differences', () => {
    const body = '====== Don’t Panic ======\nBody';
    expect(removeDuplicateHeading(body, "Don't Panic", 'x')).toBe('Body');
  });

  it('should fall back to the file name when there is no title', () => {
    const body = '\n\n===== Daily Review =====\n\nBody';
    expect(removeDuplicateHeading(body, undefined, 'daily_review')).toBe('Body');
  });

  it('should leave a heading that is not the first line', () => {
    const body = 'Intro\n\n====== Daily Review ======\n';
    expect(removeDuplicateHeading(body, 'Daily Review', 'x')).toBe(body);
  });

  it('should leave a different heading', () => {
    const body = '====== Agenda ======\n\nBody\n';
    expect(removeDuplicateHeading(body, 'Daily Review', 'daily_review')).toBe(body);
  });

  it('should only ever remove the first heading', () => {
    const body = '====== A ======\n====== A ======\nx';
    expect(removeDuplicateHeading(body, 'A', 'a')).toBe('====== A ======\nx');
  });
});
