import { Test } from '@nestjs/testing';
import { REDIS_CLIENT } from './redis.constants';
import { RedisService } from './redis.service';

describe('RedisService', () => {
  let service: RedisService;
  let client: {
    get: jest.Mock<Promise<string | null>, [string]>;
    set: jest.Mock<Promise<'OK'>, (string | number)[]>;
    eval: jest.Mock<Promise<unknown>, (string | number)[]>;
    ping: jest.Mock<Promise<string>, []>;
    quit: jest.Mock<Promise<'OK'>, []>;
  };

  beforeEach(async () => {
    client = {
      get: jest.fn<Promise<string | null>, [string]>(async () => 'cached'),
      set: jest.fn<Promise<'OK'>, (string | number)[]>(async () => 'OK'),
      eval: jest.fn<Promise<unknown>, (string | number)[]>(async () => 1),
      ping: jest.fn<Promise<string>, []>(async () => 'PONG'),
      quit: jest.fn<Promise<'OK'>, []>(async () => 'OK'),
    };

    const module = await Test.createTestingModule({
      providers: [RedisService, { provide: REDIS_CLIENT, useValue: client }],
    }).compile();

    service = module.get(RedisService);
  });

  it('passes a TTL through as milliseconds', async () => {
    await service.set('booking:lookup:ABC123', '{}', 60000);
    await service.set('booking:lookup:XYZ789', '{}');

    expect(client.set.mock.calls).toEqual([
      ['booking:lookup:ABC123', '{}', 'PX', 60000],
      ['booking:lookup:XYZ789', '{}'],
    ]);
  });

  it('spreads script keys and arguments after the key count', async () => {
    await expect(
      service.eval('return 1', ['lock:sweep'], ['token-1', 55000]),
    ).resolves.toBe(1);

    expect(client.eval).toHaveBeenCalledWith(
      'return 1',
      1,
      'lock:sweep',
      'token-1',
      55000,
    );
  });

  it('exposes only the commands the service uses', () => {
    expect(
      Object.getOwnPropertyNames(RedisService.prototype).sort(),
    ).toEqual(['constructor', 'eval', 'get', 'onModuleDestroy', 'ping', 'set']);
  });

  it('closes the connection on shutdown', async () => {
    await service.onModuleDestroy();

    expect(client.quit).toHaveBeenCalledTimes(1);
  });
});
