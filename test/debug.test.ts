import { dlog } from '@icewrite/core';

describe('dlog', () => {
  const saved = process.env.DEBUG;

  afterEach(() => {
    if (saved === undefined) delete process.env.DEBUG;
    else process.env.DEBUG = saved;
    vi.restoreAllMocks();
  });

  test('prints namespaces matched exactly or by prefix wildcard', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.env.DEBUG = 'stream:*, loopback:error';

    dlog('stream:warn', 'missing component');
    dlog('loopback:error', 'failed');
    dlog('loopback:notify', 'skipped');

    expect(log).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenNthCalledWith(1, '[stream:warn]', 'missing component');
    expect(log).toHaveBeenNthCalledWith(2, '[loopback:error]', 'failed');
  });

  test('is silent without DEBUG', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    delete process.env.DEBUG;

    dlog('stream:warn', 'x');
    expect(log).not.toHaveBeenCalled();
  });
});
