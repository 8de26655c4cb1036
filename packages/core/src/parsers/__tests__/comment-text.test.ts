/**
 * Comment Text Tests
 */

import { describe, it, expect } from 'vitest';

import { commentGroupText, findLeadComment, leadCommentText, type GoComment } from '../comment-text.js';

function line(text: string, at: number): GoComment {
  return { text, line: at, endLine: at };
}

describe('commentGroupText', () => {
  it('should strip the marker and one following space', () => {
    expect(commentGroupText([line('// StatusBadRequest Bad Request', 1)])).toBe('StatusBadRequest Bad Request\n');
  });

  it('should keep extra indentation after the first space', () => {
    expect(commentGroupText([line('//   indented', 1)])).toBe('  indented\n');
  });

  it('should drop directive lines', () => {
    const group = [
      line('//go:generate docstringer -type T', 1),
      line('//nolint:errcheck', 2),
      line('//line foo.go:1', 3),
      line('// Doc line', 4),
    ];
    expect(commentGroupText(group)).toBe('Doc line\n');
  });

  it('should keep a directive-looking line written with a space', () => {
    expect(commentGroupText([line('// go:generate is mentioned here', 1)])).toBe('go:generate is mentioned here\n');
  });

  it('should collapse runs of blank lines and drop trailing ones', () => {
    const group = [line('// a', 1), line('//', 2), line('//', 3), line('// b', 4), line('//', 5)];
    expect(commentGroupText(group)).toBe('a\n\nb\n');
  });

  it('should strip block comment markers and trailing spaces', () => {
    const group: GoComment[] = [{ text: '/* x\n   y  */', line: 1, endLine: 2 }];
    expect(commentGroupText(group)).toBe(' x\n   y\n');
  });

  it('should drop carriage returns anywhere in a comment', () => {
    expect(commentGroupText([line('// A one\rtwo\r', 1)])).toBe('A onetwo\n');
  });

  it('should return an empty string for an empty comment', () => {
    expect(commentGroupText([line('//', 1)])).toBe('');
  });
});

describe('findLeadComment', () => {
  it('should return the group ending on the line above the token', () => {
    const comments = [line('// a', 1), line('// b', 2)];
    expect(findLeadComment(comments, null, 3)).toEqual(comments);
  });

  it('should start a new group after a blank line', () => {
    const comments = [line('// a', 1), line('// b', 3)];
    expect(findLeadComment(comments, null, 4)).toEqual([line('// b', 3)]);
  });

  it('should not attach a group separated from the token by a blank line', () => {
    expect(findLeadComment([line('// a', 2)], null, 4)).toBeNull();
  });

  it('should skip a comment trailing the previous token', () => {
    const comments = [line('// trailing', 5), line('// doc', 6)];
    expect(findLeadComment(comments, 5, 7)).toEqual([line('// doc', 6)]);
  });

  it('should not treat a trailing comment as a lead comment', () => {
    expect(findLeadComment([line('// trailing', 5)], 5, 6)).toBeNull();
  });
});

describe('leadCommentText', () => {
  it('should return null when the lead comment has no text', () => {
    expect(leadCommentText([line('//go:generate x', 1)], null, 2)).toBeNull();
  });

  it('should return the text of the lead comment', () => {
    expect(leadCommentText([line('// Name text', 1)], null, 2)).toBe('Name text\n');
  });
});
