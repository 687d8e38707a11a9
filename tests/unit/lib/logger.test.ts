import { describe, it, expect, jest } from '@jest/globals';
import { Logger, getLogger, logger } from '@/lib/logger';
import { CommunityNotFoundError } from '@/lib/forumErrors';

function lastLine(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const calls = spy.mock.calls;
  return JSON.parse(String(calls[calls.length - 1][0]));
}

describe('Logger', () => {
  it('should tag every line with its module', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    new Logger('debug').forModule('forumEngine').info('Community created', { communityName: 'r1' });

    expect(log).toHaveBeenCalledTimes(1);
    const line = lastLine(log);
    expect(line).toMatchObject({
      level: 'info',
      module: 'forumEngine',
      message: 'Community created',
      fields: { communityName: 'r1' },
    });
    expect(typeof line.timestamp).toBe('string');
  });

  it('should carry operation and code on a rejected operation', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const failure = new CommunityNotFoundError('nowhere');
    new Logger('debug').forModule('forumEngine').rejected('createPost', failure);

    expect(lastLine(log)).toEqual({
      timestamp: expect.any(String),
      level: 'debug',
      module: 'forumEngine',
      message: failure.message,
      operation: 'createPost',
      code: 'COMMUNITY_NOT_FOUND',
    });
  });

  it('should drop lines below the minimum level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const scoped = new Logger('warn').forModule('exclusiveLock');
    scoped.debug('quiet');
    scoped.info('quiet');
    scoped.rejected('joinCommunity', new CommunityNotFoundError('x'));
    scoped.warn('loud');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(lastLine(warn)).toMatchObject({ level: 'warn', module: 'exclusiveLock', message: 'loud' });
  });

  it('should route errors to console.error with the error details', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    new Logger('info').error('Simulation failed', new Error('boom'));

    const line = lastLine(error);
    expect(line.level).toBe('error');
    expect(line.module).toBe('main');
    expect(line.error).toMatchObject({ name: 'Error', message: 'boom' });
  });

  it('should omit empty fields', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    new Logger('info').forModule('m').info('bare', {});
    expect(lastLine(log)).not.toHaveProperty('fields');
  });

  it('should share one process-wide instance at the configured level', () => {
    expect(getLogger()).toBe(logger);
    expect(logger.isLevelEnabled('error')).toBe(true);
    expect(logger.isLevelEnabled('warn')).toBe(false);
  });
});
