import { describe, it, expect } from 'vitest';
import { removeComments } from '../../../src/kernels/comments.js';

describe('removeComments', () => {
  it('should drop line comments and keep the newline', () => {
    expect(removeComments('int a; // first\nint b;')).toBe('int a; \nint b;');
  });

  it('should drop block comments across lines', () => {
    expect(removeComments('a /* one\n two */b')).toBe('a b');
  });

  it('should leave comment markers inside string literals alone', () => {
    expect(removeComments('s = "// not a comment"; // gone')).toBe('s = "// not a comment"; ');
  });

  it('should honour escaped quotes inside literals', () => {
    expect(removeComments('x = "a\\"/*b"; /* c */y')).toBe('x = "a\\"/*b"; y');
  });

  it('should treat character literals as literals', () => {
    expect(removeComments("c = '/'; // slash")).toBe("c = '/'; ");
  });

  it('should drop the rest of the input after an unclosed block comment', () => {
    expect(removeComments('keep /* open')).toBe('keep ');
  });
});
