import { parseRedisUrl, redisRetryStrategy } from '../redis';

describe('parseRedisUrl', () => {
  it('should default port and database', () => {
    const config = parseRedisUrl('redis://localhost');

    expect(config.host).toBe('localhost');
    expect(config.port).toBe(6379);
    expect(config.db).toBe(0);
    expect(config.password).toBeUndefined();
  });

  it('should read password, port and database', () => {
    const config = parseRedisUrl('redis://:test-secret@cache.internal:6380/2');

    expect(config.host).toBe('cache.internal');
    expect(config.port).toBe(6380);
    expect(config.password).toBe('test-secret');
    expect(config.db).toBe(2);
  });
});

describe('redisRetryStrategy', () => {
  it('should back off linearly up to 3 seconds', () => {
    expect(redisRetryStrategy(1)).toBe(100);
    expect(redisRetryStrategy(10)).toBe(1000);
  });

  it('should give up after ten attempts', () => {
    expect(redisRetryStrategy(11)).toBeNull();
  });
});
