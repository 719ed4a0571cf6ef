/**
 * Attribute classification
 */

import { describe, it, expect } from 'vitest';
import { classify, classifyCode, classifyColumn } from '../../../grading/classifier.js';
import { loadBuiltinStandards } from '../../../grading/builtin-standards.js';
import { NOT_COUNTED } from '../../../core/constants.js';
import type { GradeScale } from '../../../grading/grade-scale.js';

function jiangsuScale(key: string): GradeScale {
  const standard = loadBuiltinStandards().find((s) => s.id === 'jiangsu');
  const config = standard?.attributes.get(key);
  if (!config) {
    throw new Error(`missing builtin attribute ${key}`);
  }
  return config.scale;
}

describe('classify', () => {
  const om = jiangsuScale('OM');

  it('should grade organic matter against the builtin thresholds', () => {
    expect(classify(25, om)).toEqual({ kind: 'graded', code: '3级', rank: 3, levelIndex: 2 });
    expect(classifyCode(40, om)).toBe('2级');
    expect(classifyCode(41, om)).toBe('1级');
    expect(classifyCode(10, om)).toBe('5级');
    expect(classifyCode(10.0001, om)).toBe('4级');
    expect(classifyCode(0.1, om)).toBe('5级');
  });

  it('should grade pH on its seven-level scale', () => {
    const ph = jiangsuScale('ph');
    expect(classifyCode(4.5, ph)).toBe('1级');
    expect(classifyCode(6.8, ph)).toBe('4级');
    expect(classifyCode(9.0, ph)).toBe('6级');
    expect(classifyCode(9.1, ph)).toBe('7级');
  });

  it('should report why a value cannot be graded', () => {
    expect(classify(null, om)).toEqual({ kind: 'unclassifiable', reason: 'missing' });
    expect(classify(undefined, om)).toEqual({ kind: 'unclassifiable', reason: 'missing' });
    expect(classify(Number.NaN, om)).toEqual({ kind: 'unclassifiable', reason: 'not_a_number' });
    expect(classify(-Infinity, om)).toEqual({ kind: 'unclassifiable', reason: 'non_positive' });
    expect(classify(0, om)).toEqual({ kind: 'unclassifiable', reason: 'non_positive' });
    expect(classify(-5, om)).toEqual({ kind: 'unclassifiable', reason: 'non_positive' });
    expect(classifyCode(-5, om)).toBeNull();
  });

  it('should place +Infinity in the last level', () => {
    expect(classify(Infinity, om)).toEqual({ kind: 'graded', code: '1级', rank: 5, levelIndex: 4 });
    expect(classifyCode(Infinity, om)).toBe('1级');
  });

  it('should never lower the rank when the value grows', () => {
    const values = [0.5, 3, 9.99, 10, 10.5, 19, 20, 25, 30, 35, 40, 40.01, 80, 500];
    const ranks = values.map((value) => {
      const result = classify(value, om);
      return result.kind === 'graded' ? result.rank : 0;
    });
    for (let i = 1; i < ranks.length; i++) {
      expect(ranks[i]).toBeGreaterThanOrEqual(ranks[i - 1]);
    }
  });
});

describe('classifyColumn', () => {
  const om = jiangsuScale('OM');

  it('should match scalar classification element by element', () => {
    const values = Float64Array.from([25, 40, 41, 10, 0, -1, Number.NaN, Infinity, 39.999, 10.0001]);
    const levels = classifyColumn(values, om);

    expect(levels).toBeInstanceOf(Int16Array);
    values.forEach((value, i) => {
      const scalar = classify(value, om);
      expect(levels[i]).toBe(scalar.kind === 'graded' ? scalar.levelIndex : NOT_COUNTED);
    });
  });

  it('should mark unclassifiable entries as not counted', () => {
    const levels = classifyColumn(Float64Array.from([0, Number.NaN, 15, -Infinity]), om);
    expect(Array.from(levels)).toEqual([-1, -1, 1, -1]);
  });

  it('should grade +Infinity into the last level', () => {
    const levels = classifyColumn(Float64Array.from([Infinity, 41]), om);
    expect(Array.from(levels)).toEqual([4, 4]);
  });
});
