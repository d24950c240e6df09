import { INestApplicationContext, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { setupGracefulShutdown } from './graceful-shutdown';

@Module({})
class EmptyModule {}

describe('setupGracefulShutdown', () => {
  let app: INestApplicationContext;
  let once: jest.SpyInstance;

  beforeEach(async () => {
    once = jest.spyOn(process, 'once').mockReturnValue(process);
    app = await NestFactory.createApplicationContext(EmptyModule, {
      logger: false,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('listens once for SIGINT and SIGTERM', () => {
    setupGracefulShutdown(app, jest.fn());

    expect(once.mock.calls.map(([signal]) => signal)).toEqual([
      'SIGINT',
      'SIGTERM',
    ]);
  });

  it('closes the context once and exits cleanly', async () => {
    const exit = jest.fn();
    const close = jest.spyOn(app, 'close');
    const shutdown = setupGracefulShutdown(app, exit);

    await shutdown('SIGTERM');
    await shutdown('SIGINT');

    expect(close).toHaveBeenCalledTimes(1);
    expect(exit.mock.calls).toEqual([[0]]);
  });

  it('exits with an error code when closing fails', async () => {
    const exit = jest.fn();
    jest.spyOn(app, 'close').mockRejectedValue(new Error('still busy'));
    const shutdown = setupGracefulShutdown(app, exit);

    await shutdown('SIGINT');

    expect(exit.mock.calls).toEqual([[1]]);
  });
});
