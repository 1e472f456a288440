import { parseAllowedOrigins } from './bootstrap';

describe('parseAllowedOrigins', () => {
  it('reflects any origin when none are configured', () => {
    expect(parseAllowedOrigins('')).toBe(true);
    expect(parseAllowedOrigins(' , ')).toBe(true);
  });

  it('reflects any origin for a wildcard', () => {
    expect(parseAllowedOrigins('https://app.example.com,*')).toBe(true);
  });

  it('splits and trims a comma separated list', () => {
    expect(parseAllowedOrigins(' https://app.example.com , http://localhost:5173')).toEqual([
      'https://app.example.com',
      'http://localhost:5173',
    ]);
  });
});
