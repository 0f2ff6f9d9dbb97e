import { resolveCorsOptions } from './app.setup';

describe('resolveCorsOptions', () => {
  it('should allow every origin without credentials when unset', () => {
    expect(resolveCorsOptions(undefined)).toEqual({ origin: '*', credentials: false });
    expect(resolveCorsOptions(' , ')).toEqual({ origin: '*', credentials: false });
  });

  it('should allow every origin without credentials for a wildcard', () => {
    expect(resolveCorsOptions('https://a.example, *')).toEqual({ origin: '*', credentials: false });
  });

  it('should allow credentials for an explicit origin list', () => {
    expect(resolveCorsOptions('https://a.example, https://b.example')).toEqual({
      origin: ['https://a.example', 'https://b.example'],
      credentials: true,
    });
  });
});
