import { describe, expect, it } from 'vitest';
import { slotWindowError } from './ScheduleSlot';

describe('slotWindowError', () => {
  it('rejects empty and inverted windows', () => {
    expect(slotWindowError('10:00', '09:00')).toBe('End time 09:00 must be after start time 10:00');
    expect(slotWindowError('09:00', '09:00')).toBe('End time 09:00 must be after start time 09:00');
  });

  it('accepts a proper window and leaves partial or malformed updates to the field validators', () => {
    expect(slotWindowError('09:00', '09:50')).toBeNull();
    expect(slotWindowError('09:00', undefined)).toBeNull();
    expect(slotWindowError('25:00', '09:00')).toBeNull();
  });
});
