import { describe, expect, it } from 'vitest';
import { createMemoryBuffer } from '../buffer/memoryBuffer.js';
import type { MemoryBuffer } from '../buffer/types.js';
import {
  appendInt,
  appendZeroPadded,
  pad2,
  pad3,
  pad6,
  pad9,
  timeFraction,
} from './numericText.js';

function render(write: (dest: MemoryBuffer) => void): string {
  const dest = createMemoryBuffer(4);
  write(dest);
  return dest.toString();
}

describe('appendInt', () => {
  it('should write positive, zero and negative integers', () => {
    expect(render((dest) => appendInt(0, dest))).toBe('0');
    expect(render((dest) => appendInt(7, dest))).toBe('7');
    expect(render((dest) => appendInt(2024, dest))).toBe('2024');
    expect(render((dest) => appendInt(-314, dest))).toBe('-314');
  });

  it('should write large safe integers without losing digits', () => {
    expect(render((dest) => appendInt(9_007_199_254_740_991, dest))).toBe('9007199254740991');
    expect(render((dest) => appendInt(999_999_999_999_999, dest))).toBe('999999999999999');
  });

  it('should write bigints', () => {
    expect(render((dest) => appendInt(18_446_744_073_709_551_615n, dest))).toBe(
      '18446744073709551615',
    );
    expect(render((dest) => appendInt(-12n, dest))).toBe('-12');
  });
});

describe('pad2', () => {
  it('should prefix single digits with zero', () => {
    for (let n = 0; n <= 9; n++) {
      expect(render((dest) => pad2(n, dest))).toBe(`0${n}`);
    }
  });

  it('should write two-digit values unchanged', () => {
    expect(render((dest) => pad2(10, dest))).toBe('10');
    expect(render((dest) => pad2(59, dest))).toBe('59');
    expect(render((dest) => pad2(99, dest))).toBe('99');
  });

  it('should never truncate larger values', () => {
    expect(render((dest) => pad2(150, dest))).toBe('150');
  });

  it('should fall back to signed zero padding for negatives', () => {
    expect(render((dest) => pad2(-5, dest))).toBe('-5');
    expect(render((dest) => pad2(-42, dest))).toBe('-42');
  });
});

describe('pad3', () => {
  it('should pad to three digits', () => {
    expect(render((dest) => pad3(0, dest))).toBe('000');
    expect(render((dest) => pad3(9, dest))).toBe('009');
    expect(render((dest) => pad3(99, dest))).toBe('099');
    expect(render((dest) => pad3(105, dest))).toBe('105');
    expect(render((dest) => pad3(999, dest))).toBe('999');
  });

  it('should never truncate larger values', () => {
    expect(render((dest) => pad3(1000, dest))).toBe('1000');
  });

  it('should fall back to signed zero padding for negatives', () => {
    expect(render((dest) => pad3(-5, dest))).toBe('-05');
  });
});

describe('pad6', () => {
  it('should compose two three-digit groups', () => {
    expect(render((dest) => pad6(0, dest))).toBe('000000');
    expect(render((dest) => pad6(42, dest))).toBe('000042');
    expect(render((dest) => pad6(12_345, dest))).toBe('012345');
    expect(render((dest) => pad6(99_999, dest))).toBe('099999');
  });

  it('should write six digits and beyond as full text', () => {
    expect(render((dest) => pad6(123_456, dest))).toBe('123456');
    expect(render((dest) => pad6(1_000_000, dest))).toBe('1000000');
  });

  it('should fall back to signed zero padding for negatives', () => {
    expect(render((dest) => pad6(-42, dest))).toBe('-00042');
  });
});

describe('pad9', () => {
  it('should pad nanosecond fractions to nine digits', () => {
    expect(render((dest) => pad9(0, dest))).toBe('000000000');
    expect(render((dest) => pad9(7, dest))).toBe('000000007');
    expect(render((dest) => pad9(123_456_789, dest))).toBe('123456789');
    expect(render((dest) => pad9(4_000_500, dest))).toBe('004000500');
  });

  it('should never truncate larger values', () => {
    expect(render((dest) => pad9(1_000_000_000, dest))).toBe('1000000000');
  });
});

describe('appendZeroPadded', () => {
  it('should count the sign toward the width', () => {
    expect(render((dest) => appendZeroPadded(7, 4, dest))).toBe('0007');
    expect(render((dest) => appendZeroPadded(-7, 4, dest))).toBe('-007');
    expect(render((dest) => appendZeroPadded(-12345, 4, dest))).toBe('-12345');
  });
});

describe('timeFraction', () => {
  const timestamp = 1_409_327_746_123_456_789n;

  it('should return the sub-second part in the requested unit', () => {
    expect(timeFraction(timestamp, 'ms')).toBe(123);
    expect(timeFraction(timestamp, 'us')).toBe(123_456);
    expect(timeFraction(timestamp, 'ns')).toBe(123_456_789);
  });

  it('should return zero on whole seconds', () => {
    expect(timeFraction(1_409_327_746_000_000_000n, 'ms')).toBe(0);
  });
});
