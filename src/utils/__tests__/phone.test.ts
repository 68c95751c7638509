import { describe, expect, it } from 'vitest';
import { normalizePhone } from '../phone.js';
import { captureError } from '../../__tests__/fixtures.js';

describe('normalizePhone', () => {
  it.each([
    ['+351 912 345 678', '+351912345678'],
    ['00351912345678', '+351912345678'],
    ['912-345-678', '+351912345678'],
    ['0912345678', '+351912345678'],
    ['(+1) 212.555.0100', '+12125550100']
  ])('normalizes %j to %j', (raw, expected) => {
    expect(normalizePhone(raw, '351')).toBe(expected);
  });

  it('applies the configured country code to national numbers', () => {
    expect(normalizePhone('2125550100', '1')).toBe('+12125550100');
  });

  it.each(['', 'call me', '+0123456789', '+1234567890123456', '12'])('rejects %j', raw => {
    expect(captureError(() => normalizePhone(raw, '351'))).toMatchObject({ code: 'InvalidPhone' });
  });
});
