/**
 * Stage Tracker Tests
 */

import { describe, it, expect } from 'vitest';
import { isStageAlreadySatisfied, stageIndexOf } from '../../services/reminders/stage-tracker.service.js';

const OFFSETS = [30, 14, 3, 0];

describe('Stage Tracker', () => {
  it('should use list position as the stage index', () => {
    expect(stageIndexOf(OFFSETS, 30)).toBe(0);
    expect(stageIndexOf(OFFSETS, 0)).toBe(3);
    expect(stageIndexOf([0, 7], 7)).toBe(1);
    expect(stageIndexOf(OFFSETS, 5)).toBe(-1);
  });

  it('should send the first stage when nothing was sent yet', () => {
    expect(isStageAlreadySatisfied(OFFSETS, 30, 0)).toBe(false);
  });

  it('should send stage 2 after two prior sends', () => {
    expect(isStageAlreadySatisfied(OFFSETS, 3, 2)).toBe(false);
  });

  it('should treat stage 2 as handled once it has been sent', () => {
    expect(isStageAlreadySatisfied(OFFSETS, 3, 3)).toBe(true);
  });

  it('should not treat the last stage as handled with only two sends', () => {
    expect(isStageAlreadySatisfied(OFFSETS, 0, 2)).toBe(false);
  });

  it('should treat an earlier stage as handled when later sends exist', () => {
    expect(isStageAlreadySatisfied(OFFSETS, 14, 4)).toBe(true);
  });

  it('should reject a day that is not a stage', () => {
    expect(() => isStageAlreadySatisfied(OFFSETS, 7, 0)).toThrow(RangeError);
  });
});
