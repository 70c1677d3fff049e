import { describe, it, expect } from 'vitest';
import { settingsSchema } from '../settings-schema';

describe('settingsSchema', () => {
  it('fills defaults for an empty object', () => {
    expect(settingsSchema.parse({})).toEqual({
      historySize: 1000,
      selectionGrow: 7,
      selectionFeather: 7,
      selectionPadding: 7,
      showControlEnd: false,
    });
  });

  it('accepts overrides', () => {
    const result = settingsSchema.safeParse({ historySize: 40, showControlEnd: true });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.historySize).toBe(40);
      expect(result.data.showControlEnd).toBe(true);
    }
  });

  it('rejects a negative history size', () => {
    expect(settingsSchema.safeParse({ historySize: -1 }).success).toBe(false);
  });

  it('rejects fractional history sizes', () => {
    expect(settingsSchema.safeParse({ historySize: 10.5 }).success).toBe(false);
  });

  it('rejects percentages over 100', () => {
    expect(settingsSchema.safeParse({ selectionGrow: 150 }).success).toBe(false);
  });
});
